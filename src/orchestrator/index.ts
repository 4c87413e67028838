export * from './types.js';
export { Orchestrator, type OrchestratorOptions } from './orchestrator.js';
export { fillTemplate, fallbackQuestions, parseQuestions, fitQuestions } from './planner.js';
export { runBounded, settleWithin, type Settlement } from './executor.js';
export { simpleSynthesis, formatAgentResponses } from './synthesizer.js';
