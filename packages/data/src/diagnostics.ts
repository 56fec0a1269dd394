/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Collector for recoverable errors and warnings raised during one conversion.
 */

import type { DiagnosticKind, RecoverableErrorKind } from './errors.js';
import type { Logger } from './logger.js';

export type DiagnosticSeverity = 'error' | 'warning';

export interface DiagnosticContext {
  primitiveIndex?: number;
  meshIndex?: number;
  nodeIndex?: number;
  boneName?: string;
  materialName?: string;
  [key: string]: unknown;
}

export interface Diagnostic {
  severity: DiagnosticSeverity;
  kind: DiagnosticKind;
  message: string;
  context: DiagnosticContext;
}

const RECOVERABLE_KINDS: ReadonlySet<DiagnosticKind> = new Set<RecoverableErrorKind>([
  'MalformedPrimitive',
  'MissingRequiredAttribute',
]);

export function severityOf(kind: DiagnosticKind): DiagnosticSeverity {
  return RECOVERABLE_KINDS.has(kind) ? 'error' : 'warning';
}

export class Diagnostics {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly logger?: Logger) {}

  record(kind: DiagnosticKind, message: string, context: DiagnosticContext = {}): Diagnostic {
    const diagnostic: Diagnostic = { severity: severityOf(kind), kind, message, context };
    this.entries.push(diagnostic);
    this.logger?.warn(`${kind}: ${message}`, {
      primitiveIndex: context.primitiveIndex,
      nodeIndex: context.nodeIndex,
    });
    return diagnostic;
  }

  get all(): readonly Diagnostic[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  ofKind(kind: DiagnosticKind): Diagnostic[] {
    return this.entries.filter((d) => d.kind === kind);
  }

  errors(): Diagnostic[] {
    return this.entries.filter((d) => d.severity === 'error');
  }

  warnings(): Diagnostic[] {
    return this.entries.filter((d) => d.severity === 'warning');
  }
}
