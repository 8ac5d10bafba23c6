// @module: shared-schemas-root
// @tags: schemas, exports
export * from './ws/envelope.js';
export * from './ws/chat.js';
export * from './ws/call.js';
export * from './ws/location.js';
export * from './ws/system.js';
export * from './ws/inbound.js';
export * from './ws/outbound.js';
export * from './rest/messages.js';
