/**
 * Descriptor model for operations registered outside the AWS SDK.
 *
 * Mirrors the AWS service model layout (operation + shape table) closely enough
 * that a descriptor can be copied from a service definition by hand.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * `v4` signs the body hash; `v4-unsigned-body` signs headers only and sends
 * `UNSIGNED-PAYLOAD` as the content hash (required for streamed bodies).
 */
export type AuthType = 'v4' | 'v4-unsigned-body';

export interface MemberDescriptor {
  readonly shape: string;
  readonly location?: 'header';
  readonly locationName?: string;
}

export interface StructureShape {
  readonly type: 'structure';
  readonly required?: readonly string[];
  readonly members: Readonly<Record<string, MemberDescriptor>>;
  /** Member carried as the raw HTTP body */
  readonly payload?: string;
}

export interface StringShape {
  readonly type: 'string';
  readonly enum?: readonly string[];
}

export interface TimestampShape {
  readonly type: 'timestamp';
}

export interface BlobShape {
  readonly type: 'blob';
  readonly streaming?: boolean;
}

export type ShapeDescriptor = StructureShape | StringShape | TimestampShape | BlobShape;

export interface OperationDescriptor {
  readonly name: string;
  readonly http: {
    readonly method: HttpMethod;
    readonly requestUri: string;
  };
  readonly input: { readonly shape: string };
  readonly output: { readonly shape: string };
  readonly errors: readonly { readonly shape: string }[];
  readonly authType: AuthType;
}

/**
 * An operation plus every shape it references.
 */
export interface OperationModel {
  readonly operation: OperationDescriptor;
  readonly shapes: Readonly<Record<string, ShapeDescriptor>>;
}

/**
 * Look up a structure shape, failing when the model is inconsistent.
 */
export function structureShape(model: OperationModel, shapeName: string): StructureShape {
  const shape = model.shapes[shapeName];
  if (!shape || shape.type !== 'structure') {
    throw new Error(
      `Operation model ${model.operation.name} does not define structure shape "${shapeName}"`
    );
  }
  return shape;
}
