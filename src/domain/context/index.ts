/**
 * @lumberline/core - Context Module
 *
 * Per-execution-context span stacks
 */

export type { IContextStack } from './IContextStack';
export { ContextStack } from './ContextStack';
