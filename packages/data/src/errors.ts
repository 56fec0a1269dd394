/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Error taxonomy shared by every stage of the conversion pipeline.
 *
 * Fatal kinds are thrown as {@link PipelineError} and abort the current file.
 * Recoverable and warning kinds are recorded through `Diagnostics` instead.
 */

/** Kinds that abort the conversion of a whole file */
export type FatalErrorKind =
  | 'MalformedContainer'
  | 'UnsupportedSchema'
  | 'AccessorOutOfRange'
  | 'CyclicHierarchy'
  | 'AmbiguousBoneAlias'
  | 'MalformedTaxonomy'
  | 'OverlappingMaterialRule'
  | 'InvalidConfig'
  | 'OutputWriteFailed'
  | 'Cancelled';

/** Kinds recovered at primitive level: the primitive is skipped */
export type RecoverableErrorKind = 'MalformedPrimitive' | 'MissingRequiredAttribute';

/** Kinds that never abort anything */
export type WarningKind =
  | 'SuspiciousUVRange'
  | 'UnresolvedBoneAlias'
  | 'DuplicateBoneBinding'
  | 'AmbiguousMaterialMatch'
  | 'ExternalImage';

export type ErrorKind = FatalErrorKind | RecoverableErrorKind;

export type DiagnosticKind = RecoverableErrorKind | WarningKind;

/** Error thrown by any pipeline stage */
export class PipelineError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export function isPipelineError(error: unknown, kind?: ErrorKind): error is PipelineError {
  return error instanceof PipelineError && (kind === undefined || error.kind === kind);
}
