import type { OperationInput, OperationOutput } from '../transport/types';

/**
 * Issues a control-plane operation. Errors propagate unmodified.
 */
export type ControlPlaneCaller = (
  operationName: string,
  input: OperationInput
) => Promise<OperationOutput>;
