import type { DiagnosticId } from './types.js';

/**
 * Fatal code-generation error.
 *
 * Thrown by the code generator and the command source; the emission driver turns it into a located
 * diagnostic and abandons the output stream.
 */
export class TranslationError extends Error {
  readonly id: DiagnosticId;

  constructor(id: DiagnosticId, message: string) {
    super(message);
    this.name = 'TranslationError';
    this.id = id;
  }
}
