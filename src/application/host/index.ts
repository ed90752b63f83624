/**
 * @lumberline/core - Hosting Module
 *
 * Background service lifecycle
 */

export type { IBackgroundService } from './BackgroundService';
export { BackgroundServiceBase } from './BackgroundService';
