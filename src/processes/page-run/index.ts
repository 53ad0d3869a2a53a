/**
 * Page Run process - public API
 *
 * One pass over every configured page
 */
export {
  createRunOrchestrator,
  walkPages,
  type RunOrchestrator,
  type RunOrchestratorDeps,
  type RunOrchestratorOptions,
  type DelayRange,
} from './lib';
