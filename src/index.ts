/**
 * actor-dispatch -- numeric method selectors for actors.
 */

export * from './dispatch/index.js';
export { getErrorMessage } from './infra/errors.js';
