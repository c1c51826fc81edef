export {
  AutodiffError,
  ArityError,
  EmptyGraphError,
  GradientReleasedError,
  IndexOutOfBoundsError,
  type AutodiffErrorCode,
} from './AutodiffError';
export { MonoOp, MonoOps, checkChain, findMonoOp, isMonoOp, parseMonoOp } from './MonoOps';
export { MULTI_OP_ARITY, MultiOp, MultiOps, findMultiOp, isMultiOp, parseMultiOp } from './MultiOps';
export { validateGraph, type MultiGraph, type MultiNode } from './GraphValidator';
export {
  GradientTape,
  MonoTape,
  type GradientProgram,
  type GradientTapeSnapshot,
  type MonoTapeSnapshot,
  type TapeRecord,
} from './GradientTape';
export { OwnedGradient, SharedGradient, type SnapshotProgram } from './GradientHandle';
export { MultiAD, type MultiGradient, type MultiResult, type SharedMultiGradient } from './MultiAD';
export { MonoAD, type MonoGradient, type MonoResult, type SharedMonoGradient } from './MonoAD';

// Graph construction helpers
export { GraphBuilder } from './GraphBuilder';
export { monoOps, multiOps, type NodeTuple } from './ops';
export {
  checkChainGradient,
  checkGradient,
  type GradientCheckEntry,
  type GradientCheckOptions,
  type GradientCheckResult,
} from './GradientCheck';
export { GraphFileError, graphFileSchema, loadGraphFile, parseGraphFile, readGraphFile, type GraphFile } from './GraphFile';
