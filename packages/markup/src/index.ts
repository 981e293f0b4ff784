/**
 * @ctz/markup
 *
 * Converts CircuiTikZ drawing markup into the JSON document the circuit
 * editor imports. Pure and synchronous: no I/O beyond the bundled
 * component library.
 */

import { assembleDocument, type AssembleOptions } from './assembler/assembler.js';
import { DocumentBuilder, type DocumentBuilderOptions } from './builder/document-builder.js';
import { type DrawingEnvironment, extractDrawingEnvironments } from './environment.js';
import { scanStatements } from './splitter/splitter.js';
import { createDiagnostic, type Diagnostic } from './types/diagnostics.js';
import type { CircuitDocument } from './types/elements.js';

// Re-export error types
export {
  BuildError,
  ClassificationError,
  ConversionError,
  LexError,
  StructuralError,
  UnresolvedReferenceError,
} from './errors.js';

export { assembleDocument, cleanNumber, DOCUMENT_VERSION, PX_PER_CM, PX_PER_CM_SHAPE } from './assembler/assembler.js';
export type { AssembleOptions } from './assembler/assembler.js';
export { DEFAULT_LIMITS, DocumentBuilder } from './builder/document-builder.js';
export type { BuiltDocument, ConversionLimits, DocumentBuilderOptions } from './builder/document-builder.js';
export type { PointExpr } from './builder/point.js';
export { buildStatement } from './builder/statement-builder.js';
export type { BuildContext } from './builder/statement-builder.js';
export type { StatementResult } from './builder/draft.js';
export { CLASSIFICATION_RULES, classify, StatementKind } from './classifier/classifier.js';
export type { Classification, ClassificationRule } from './classifier/classifier.js';
export {
  ComponentLibrary,
  ComponentLibrarySchema,
  defaultLibrary,
  loadComponentLibrary,
  segmentTarget,
} from './components/library.js';
export type { ComponentEntry, ComponentKind } from './components/library.js';
export { emitMarkup } from './emitter/emitter.js';
export { DRAWING_ENVIRONMENTS, extractDrawingEnvironments } from './environment.js';
export type { DrawingEnvironment } from './environment.js';
export * from './lexer/index.js';
export { normalizeLabel } from './options/label.js';
export { formatOptions, mergeOptions, parseOptions } from './options/options.js';
export type { OptionSet, OptionValue } from './options/options.js';
export { maskComments, scanStatements, splitStatements } from './splitter/splitter.js';
export type { StatementSource } from './splitter/splitter.js';
export { createDiagnostic, DIAGNOSTIC_SEVERITY } from './types/diagnostics.js';
export type { Diagnostic, DiagnosticCode, DiagnosticSeverity } from './types/diagnostics.js';
export type * from './types/elements.js';

/**
 * Options for a conversion
 */
export interface ConvertOptions extends DocumentBuilderOptions, AssembleOptions {}

export interface ConversionResult {
  document: CircuitDocument;
  /** Problems found, in statement order; never instead of the document */
  diagnostics: Diagnostic[];
}

/**
 * Convert the body of one drawing environment
 *
 * Content problems never throw: each dropped statement or element is
 * reported once in `diagnostics`.
 *
 * @example
 * ```ts
 * const { document } = convert('\\draw (0,0) to[R, l=$R_1$] (2,0);');
 * document.elements[0].type; // 'component'
 * ```
 */
export function convert(body: string, options: ConvertOptions = {}): ConversionResult {
  const builder = new DocumentBuilder(options);
  for (const statement of scanStatements(body)) {
    builder.addStatement(statement);
  }

  const { elements, diagnostics } = builder.finish();
  return { document: assembleDocument(elements, options), diagnostics };
}

export interface SourceConversionResult extends ConversionResult {
  /** The converted environment, null when the source has none */
  environment: DrawingEnvironment | null;
}

/**
 * Convert the first drawing environment of a source file
 *
 * Diagnostic positions refer to the source file, not the environment body.
 */
export function convertSource(source: string, options: ConvertOptions = {}): SourceConversionResult {
  const environments = extractDrawingEnvironments(source);
  if (environments.length === 0) {
    return {
      document: assembleDocument([], options),
      diagnostics: [
        createDiagnostic('missing-environment', 'No circuitikz or tikzpicture environment found', -1, {
          line: 1,
          column: 0,
          offset: 0,
        }),
      ],
      environment: null,
    };
  }

  const [environment] = environments;
  const { document, diagnostics } = convert(environment.body, options);
  return {
    document,
    diagnostics: diagnostics.map((diagnostic) => ({
      ...diagnostic,
      offset: diagnostic.offset + environment.offset,
      line: diagnostic.line + environment.line - 1,
      column: diagnostic.line === 1 ? diagnostic.column + environment.column : diagnostic.column,
    })),
    environment,
  };
}
