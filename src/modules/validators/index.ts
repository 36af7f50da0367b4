// Validator exports
export * from './assistant';
export * from './thread';
export * from './message';
export * from './run';
export * from './file';
export * from './chat';
