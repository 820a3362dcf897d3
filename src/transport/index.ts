/**
 * Transport layer exports for mailprobe
 */

export { LineConnection } from './connection.js';
export type { ConnectionState, LineConnectionEvents } from './connection.js';
