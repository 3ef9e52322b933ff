export { classifyIntent, parseIntent } from './classifyIntent.js';
export { generateReply } from './generateReply.js';
export { extractMeetingDetails, sliceJson } from './extractMeetingDetails.js';
