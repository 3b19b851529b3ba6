export { LineProtocolEncoder, formatField, nowInSeconds } from './line-protocol.js';
