/**
 * 解码脚本提取模块公共导出
 */

// 主管线
export { ScriptExtractor, extractDecodeScript, extractDecodeScriptOrThrow } from './ScriptExtractor.js';
export type { ScriptExtractorOptions } from './ScriptExtractor.js';

// 各阶段
export { extractIndirectionTable, referencesTable, resolveGlobalDeclaration } from './IndirectionTableExtractor.js';
export {
  actionObjectVariant,
  createDecipherRegistry,
  extractDecipherFragment,
  helperObjectVariant,
  validateHelperObject,
} from './DecipherExtractor.js';
export type { StageOptions } from './DecipherExtractor.js';
export {
  cleanLegacyNTransform,
  createNTransformRegistry,
  extractNTransformFragment,
  legacyNTransformVariant,
  legacyTableNTransformVariant,
  modernVariant,
  stripLegacyGuard,
  stripModernGuard,
} from './NTransformExtractor.js';
export { assembleScript, collectDeclarations } from './ScriptAssembler.js';
export { buildInvocation } from './invocation.js';

// 变体注册表
export { VariantRegistry } from './VariantRegistry.js';
export type { CascadeFailure } from './VariantRegistry.js';

// 模式库
export { classifyHelperOperation, findHelperOperations, HELPER_OPERATIONS } from './patterns.js';
export { findClosingDelimiter, extractBalancedBlock } from './BraceScanner.js';

export {
  CANONICAL_NAMES,
  DECIPHER_VARIANTS,
  N_TRANSFORM_VARIANTS,
} from './types.js';
export type {
  ArrayHelperOperation,
  DecipherFragment,
  DecipherVariantName,
  ExtractionContext,
  ExtractionReport,
  ExtractionResult,
  ExtractOptions,
  IndirectionTable,
  NTransformFragment,
  NTransformVariantName,
  ScriptFragment,
  ScriptTarget,
  StageOutcome,
  VariantStrategy,
} from './types.js';
