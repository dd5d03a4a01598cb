/**
 * Monitor directory
 *
 * @module reconcilers/monitors
 */

export { openSession, resolveMonitor, findMonitorsByName } from './directory.js';
export type { ResolveMonitorOptions } from './directory.js';
