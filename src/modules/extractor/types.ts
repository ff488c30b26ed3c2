/**
 * Type definitions for the decode-script extractor
 */

import type { ExtractionError } from '../../utils/errors.js';

// ==================== 规范名称 ====================

/** Names the executor calls; fixed across bundles. */
export const CANONICAL_NAMES = {
  decipher: 'DecipherFunc',
  nTransform: 'NTransformFunc',
} as const;

export type ScriptTarget = keyof typeof CANONICAL_NAMES;

// ==================== 变体 ====================

export const DECIPHER_VARIANTS = ['action-object', 'helper-object'] as const;
export type DecipherVariantName = (typeof DECIPHER_VARIANTS)[number];

export const N_TRANSFORM_VARIANTS = ['modern', 'legacy', 'legacy-table'] as const;
export type NTransformVariantName = (typeof N_TRANSFORM_VARIANTS)[number];

export type ArrayHelperOperation = 'reverse' | 'slice-from' | 'splice-drop-prefix' | 'swap-first-and-nth';

export type DecipherDriverKind = 'direct' | 'table-split' | 'table-indexed';

// ==================== 匹配结果 ====================

export interface ShapeMatch {
  /** Full matched span, verbatim. */
  source: string;
  /** Offset of the span in the bundle. */
  index: number;
}

export interface IndirectionTable {
  variableName: string;
  /** `var NAME=...` without the terminating semicolon. */
  declarationSource: string;
}

export interface HelperObjectMatch extends ShapeMatch {
  name: string;
  /** Text between the object's braces. */
  body: string;
}

export interface ActionObjectMatch extends ShapeMatch {
  name: string;
  methodKeys: string[];
}

export interface DecipherDriverMatch extends ShapeMatch {
  kind: DecipherDriverKind;
  parameter: string;
  /** Table the driver indexes into (table-split / table-indexed). */
  tableName?: string;
  /** Object whose methods the driver calls (table-indexed only). */
  objectName?: string;
}

export interface GlobalDeclarationMatch extends ShapeMatch {
  variableName: string;
}

export type NTransformShapeKind = 'modern' | 'legacy' | 'legacy-table';

export interface NTransformMatch extends ShapeMatch {
  kind: NTransformShapeKind;
  parameter: string;
  /** Table the head indexes into (modern only). */
  tableName?: string;
}

// ==================== 片段 ====================

export interface ScriptFragment {
  /** Name of the variant strategy that produced the fragment. */
  variant: string;
  /** Function expression source as matched; a trailing semicolon is dropped on assembly. */
  functionSource: string;
  /** Global `var` declarations the function needs, without semicolons. */
  declarations: string[];
  /** Companion object statements (helper / action objects), terminated. */
  companions: string[];
  /** Indirection table the function indexes, when it uses one. */
  tableName?: string;
}

export type DecipherFragment = ScriptFragment;
export type NTransformFragment = ScriptFragment;

// ==================== 级联 ====================

export interface ExtractionContext {
  bundle: string;
  table?: IndirectionTable;
}

export type StageOutcome<T> =
  | { matched: true; value: T }
  | { matched: false; error: ExtractionError };

export function matched<T>(value: T): StageOutcome<T> {
  return { matched: true, value };
}

export function missed<T>(error: ExtractionError): StageOutcome<T> {
  return { matched: false, error };
}

export interface VariantStrategy<T> {
  name: string;
  description: string;
  extract(context: ExtractionContext): StageOutcome<T>;
}

// ==================== 结果 ====================

export interface ExtractionReport {
  decipherVariant: string;
  nTransformVariant: string;
  indirectionTable?: string;
  durationMs: number;
}

export type ExtractionResult =
  | { success: true; script: string; report: ExtractionReport }
  | { success: false; error: ExtractionError };

export interface ExtractOptions {
  maxBundleSize?: number;
  /** Cascade order by variant name; defaults to the registry order. */
  decipherVariants?: readonly string[];
  nTransformVariants?: readonly string[];
}
