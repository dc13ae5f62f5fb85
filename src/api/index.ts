/**
 * Complexity-stratified API namespaces.
 *
 * - `query.*` — O(1) operations on positions already at hand
 * - `scan.*` — O(n) operations that walk the view
 */

export { query } from './query.ts';
export { scan } from './scan.ts';
