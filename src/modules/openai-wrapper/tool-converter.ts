import type { FunctionDefinition } from '../models';
import type { ModelToolSchema } from './types';

export const RETRIEVAL_FUNCTION_NAME = 'retrieval';
export const CODE_INTERPRETER_FUNCTION_NAME = 'code_interpreter';

export class ToolSchemaConverter {
  /**
   * Schema for a caller-defined function
   */
  static functionTool(definition: FunctionDefinition): ModelToolSchema {
    return {
      name: definition.name,
      description: definition.description,
      parameters: definition.parameters ?? { type: 'object', properties: {} },
    };
  }

  static retrievalTool(): ModelToolSchema {
    return {
      name: RETRIEVAL_FUNCTION_NAME,
      description:
        'Search the files attached to this conversation. Results are numbered sources; cite them as [n] in your answer.',
      parameters: {
        type: 'object',
        properties: {
          query: { type: 'string', description: 'What to look for' },
        },
      },
    };
  }

  static codeInterpreterTool(): ModelToolSchema {
    return {
      name: CODE_INTERPRETER_FUNCTION_NAME,
      description:
        'Run Python code in a sandbox and return what it prints. Print every value you need to see.',
      parameters: {
        type: 'object',
        properties: {
          code: { type: 'string', description: 'Python source to execute' },
        },
        required: ['code'],
      },
    };
  }

  /**
   * Check a function schema against what the Chat Completions API accepts
   */
  static validateFunctionSchema(definition: FunctionDefinition): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    if (!/^[a-zA-Z0-9_-]{1,64}$/.test(definition.name)) {
      errors.push(`Function name '${definition.name}' must be 1-64 letters, digits, underscores or hyphens`);
    }

    const parameters = definition.parameters;
    if (parameters !== undefined) {
      if (parameters.type !== 'object') {
        errors.push(`Parameters of '${definition.name}' must be a JSON schema of type "object"`);
      }
      const properties = parameters.properties;
      if (properties !== undefined && (typeof properties !== 'object' || properties === null || Array.isArray(properties))) {
        errors.push(`Parameters of '${definition.name}' must declare properties as an object`);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
