export { SessionRegistry, TerminalState } from './SessionRegistry';
export {
  CompletionOrchestrator,
  CompletionOrchestratorOptions,
  OrchestratorSettings,
  OrchestratorStats,
} from './CompletionOrchestrator';
