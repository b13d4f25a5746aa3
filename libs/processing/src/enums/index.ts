export { LifecycleState, LIFECYCLE_RANK } from './lifecycle-state.enum';
export { FailureKind } from './failure-kind.enum';
export { OperationStage } from './operation-stage.enum';
export { ExecutionMode } from './execution-mode.enum';
