export { GaussianInputLocator } from './gaussianInputLocator';
export { GaussianLogLocator, chooseLogStrategy, runLogStateMachine } from './gaussianLogLocator';
export { MolproInputLocator } from './molproInputLocator';
export { MolproOutputLocator } from './molproOutputLocator';
export type { BlockLocator, LineLayout, RawBlock } from './blockLocator';
export type { LogProbes, LogRun, LogState } from './gaussianLogLocator';
