/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @rigkit/data - Logging, error taxonomy and diagnostics shared by every package
 */

export { createLogger, isDebugEnabled } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';

export { PipelineError, isPipelineError } from './errors.js';
export type {
  ErrorKind,
  FatalErrorKind,
  RecoverableErrorKind,
  WarningKind,
  DiagnosticKind,
} from './errors.js';

export { Diagnostics, severityOf } from './diagnostics.js';
export type { Diagnostic, DiagnosticContext, DiagnosticSeverity } from './diagnostics.js';

export { identityTransform } from './types.js';
export type { Vec2, Vec3, Quat, Transform } from './types.js';
