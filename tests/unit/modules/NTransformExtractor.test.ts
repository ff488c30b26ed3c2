import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  cleanLegacyNTransform,
  extractNTransformFragment,
  stripLegacyGuard,
  stripModernGuard,
} from '../../../src/modules/extractor/NTransformExtractor.js';
import { ExtractionErrorCodes } from '../../../src/utils/errors.js';
import {
  ARRAY_TABLE_BUNDLE,
  ARRAY_TABLE_DECLARATION,
  LEGACY_BUNDLE,
  LEGACY_N_CLEANED,
  LEGACY_TABLE_N,
  LEGACY_TABLE_N_CLEANED,
  MODERN_N,
  MODERN_N_CLEANED,
  TABLE_BUNDLE,
  TABLE_DECLARATION,
  UNRELATED_BUNDLE,
} from '../../helpers/bundles.js';

const xxTable = { variableName: 'XX', declarationSource: TABLE_DECLARATION };
const qqTable = { variableName: 'QQ', declarationSource: ARRAY_TABLE_DECLARATION };

describe('NTransformExtractor', () => {
  describe('guard removal', () => {
    it('strips the modern guard and keeps the statement boundary', () => {
      assert.strictEqual(
        stripModernGuard('function(a){var b=1;if(typeof c==="undefined")return a;return b}'),
        'function(a){var b=1;return b}',
      );
      assert.strictEqual(
        stripModernGuard("function(a){var b=1; if (typeof c == 'undefined') return a;return b}"),
        'function(a){var b=1;return b}',
      );
    });

    it('strips a table-indexed modern guard only when given the table name', () => {
      const fragment = 'function(a){var b=1;if(typeof a===XX[0])return a;return b}';
      assert.strictEqual(stripModernGuard(fragment, 'XX'), 'function(a){var b=1;return b}');
      assert.strictEqual(stripModernGuard(fragment), fragment);
    });

    it('strips a legacy guard by parameter identity', () => {
      assert.strictEqual(
        stripLegacyGuard('function(a){var b=1;if(typeof Qz==="undefined")return a;return b}', 'a'),
        'function(a){var b=1;;return b}',
      );
    });

    it('leaves guards returning another name untouched', () => {
      const fragment = 'function(a){if(typeof a==="undefined")return ab;return a}';
      assert.strictEqual(stripLegacyGuard(fragment, 'a'), fragment);
    });

    it('is a no-op on an already cleaned fragment', () => {
      assert.strictEqual(stripModernGuard(MODERN_N_CLEANED, 'XX'), MODERN_N_CLEANED);
      assert.strictEqual(stripLegacyGuard(LEGACY_N_CLEANED, 'a'), LEGACY_N_CLEANED);
    });

    it('fails instead of passing a fragment without a parameter through', () => {
      const outcome = cleanLegacyNTransform('function(){return 1}');
      assert.strictEqual(outcome.matched, false);
      if (!outcome.matched) {
        assert.strictEqual(outcome.error.code, ExtractionErrorCodes.N_TRANSFORM_PARAMETER_NOT_FOUND);
        assert.strictEqual(outcome.error.shape, 'FUNCTION_PARAMETER');
      }
    });

    it('cleans a table-wrapped legacy fragment', () => {
      assert.deepStrictEqual(cleanLegacyNTransform(LEGACY_TABLE_N), {
        matched: true,
        value: LEGACY_TABLE_N_CLEANED,
      });
    });
  });

  describe('extractNTransformFragment', () => {
    it('extracts the modern variant with the table declaration', () => {
      assert.deepStrictEqual(extractNTransformFragment(TABLE_BUNDLE, xxTable), {
        matched: true,
        value: {
          variant: 'modern',
          functionSource: MODERN_N_CLEANED,
          declarations: [TABLE_DECLARATION],
          companions: [],
          tableName: 'XX',
        },
      });
    });

    it('follows the table the modern head indexes past a decoy declaration', () => {
      const decoy = { variableName: 'langs', declarationSource: 'var langs=["en","fr"]' };
      const outcome = extractNTransformFragment(`var langs=["en","fr"];\n${TABLE_BUNDLE}`, decoy);

      assert.ok(outcome.matched);
      assert.strictEqual(outcome.value.functionSource, MODERN_N_CLEANED);
      assert.deepStrictEqual(outcome.value.declarations, [TABLE_DECLARATION]);
      assert.strictEqual(outcome.value.tableName, 'XX');
    });

    it('requires the global declaration of the modern table', () => {
      const outcome = extractNTransformFragment(`var Wn=${MODERN_N};`, undefined, { order: ['modern'] });
      assert.strictEqual(outcome.matched, false);
      if (!outcome.matched) {
        assert.strictEqual(outcome.error.code, ExtractionErrorCodes.GLOBAL_DECLARATIONS_NOT_FOUND);
        assert.strictEqual(outcome.error.context?.referencedName, 'XX');
      }
    });

    it('extracts the legacy variant without declarations', () => {
      assert.deepStrictEqual(extractNTransformFragment(LEGACY_BUNDLE), {
        matched: true,
        value: {
          variant: 'legacy',
          functionSource: LEGACY_N_CLEANED,
          declarations: [],
          companions: [],
        },
      });
    });

    it('extracts the table-wrapped legacy variant with its declaration', () => {
      assert.deepStrictEqual(extractNTransformFragment(ARRAY_TABLE_BUNDLE, qqTable), {
        matched: true,
        value: {
          variant: 'legacy-table',
          functionSource: LEGACY_TABLE_N_CLEANED,
          declarations: [ARRAY_TABLE_DECLARATION],
          companions: [],
          tableName: 'QQ',
        },
      });
    });

    it('requires a global declaration for the table-wrapped legacy variant', () => {
      const outcome = extractNTransformFragment(`var Pn=${LEGACY_TABLE_N};`);
      assert.strictEqual(outcome.matched, false);
      if (!outcome.matched) {
        assert.strictEqual(outcome.error.code, ExtractionErrorCodes.GLOBAL_DECLARATIONS_NOT_FOUND);
        assert.strictEqual(outcome.error.shape, 'GLOBAL_VARIABLE_DECLARATION');
      }
    });

    it('reports every missed shape when nothing matches', () => {
      const outcome = extractNTransformFragment(UNRELATED_BUNDLE);
      assert.strictEqual(outcome.matched, false);
      if (!outcome.matched) {
        assert.strictEqual(outcome.error.code, ExtractionErrorCodes.N_TRANSFORM_NOT_FOUND);
        assert.strictEqual(outcome.error.shape, 'N_TRANSFORM_LEGACY_TABLE');
        assert.deepStrictEqual(
          outcome.error.context?.attempts,
          ['N_TRANSFORM_MODERN', 'N_TRANSFORM_LEGACY', 'N_TRANSFORM_LEGACY_TABLE'].map((shape, i) => ({
            variant: ['modern', 'legacy', 'legacy-table'][i],
            code: ExtractionErrorCodes.N_TRANSFORM_NOT_FOUND,
            shape,
          })),
        );
      }
    });

    it('honours a custom order', () => {
      const outcome = extractNTransformFragment(TABLE_BUNDLE, xxTable, { order: ['legacy'] });
      assert.strictEqual(outcome.matched, false);
      if (!outcome.matched) {
        assert.strictEqual(outcome.error.shape, 'N_TRANSFORM_LEGACY');
      }
    });
  });
});
