// public api for @promptqueue/sdk
// usage:
//   import { defineHandler, TransientTaskError } from '@promptqueue/sdk';
//   const summarize = defineHandler({ kind: 'summarize', schema, handler: async (ctx) => { ... } });

export type { TaskPayload, HandlerContext, HandlerDefinition } from './types';
export { HandlerRegistry, defineHandler, createRegistry } from './handler';
export { TransientTaskError, PermanentTaskError, classifyError } from './errors';
export type { ClassifiedError, FailureClassification } from './errors';
export { serialize, deserialize, SerializationError, MAX_VALUE_BYTES } from './utils/serialization';
