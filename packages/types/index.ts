export * from './errors.js';
export * from './meeting.js';
export * from './conversation.js';
