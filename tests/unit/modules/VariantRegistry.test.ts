import { describe, it } from 'node:test';
import assert from 'node:assert';
import { VariantRegistry } from '../../../src/modules/extractor/VariantRegistry.js';
import { matched, missed, type VariantStrategy } from '../../../src/modules/extractor/types.js';
import { ExtractionError, ExtractionErrorCodes, type ExtractionErrorCode } from '../../../src/utils/errors.js';

function hit(name: string, value: string): VariantStrategy<string> {
  return { name, description: name, extract: () => matched(value) };
}

function miss(name: string, code: ExtractionErrorCode, shape: string, context?: Record<string, unknown>): VariantStrategy<string> {
  return {
    name,
    description: name,
    extract: () => missed(new ExtractionError(code, shape, `${shape} missed`, context)),
  };
}

function createRegistry(): VariantRegistry<string> {
  return new VariantRegistry<string>(
    'test',
    () => new ExtractionError(ExtractionErrorCodes.N_TRANSFORM_NOT_FOUND, 'EMPTY', 'nothing configured'),
  );
}

const context = { bundle: '' };

describe('VariantRegistry', () => {
  it('supports register/get/has/list/unregister', () => {
    const registry = createRegistry().register(hit('a', 'A')).register(hit('b', 'B'));

    assert.deepStrictEqual(registry.names(), ['a', 'b']);
    assert.strictEqual(registry.has('a'), true);
    assert.strictEqual(registry.get('b')?.description, 'b');
    assert.strictEqual(registry.list().length, 2);
    assert.strictEqual(registry.unregister('a'), true);
    assert.strictEqual(registry.unregister('a'), false);
    assert.deepStrictEqual(registry.names(), ['b']);
  });

  it('keeps the original position when a variant is replaced', () => {
    const registry = createRegistry().register(hit('a', 'A')).register(hit('b', 'B')).register(hit('a', 'A2'));

    assert.deepStrictEqual(registry.names(), ['a', 'b']);
    assert.deepStrictEqual(registry.run(context), { matched: true, value: 'A2' });
  });

  it('returns the first match in registration order', () => {
    const registry = createRegistry()
      .register(miss('a', ExtractionErrorCodes.N_TRANSFORM_NOT_FOUND, 'A'))
      .register(hit('b', 'B'))
      .register(hit('c', 'C'));

    assert.deepStrictEqual(registry.run(context), { matched: true, value: 'B' });
  });

  it('follows an explicit order', () => {
    const registry = createRegistry().register(hit('b', 'B')).register(hit('c', 'C'));

    assert.deepStrictEqual(registry.run(context, ['c', 'b']), { matched: true, value: 'C' });
    assert.deepStrictEqual(registry.ordered([]).map((s) => s.name), ['b', 'c']);
  });

  it('reports the last failure with earlier attempts attached', () => {
    const registry = createRegistry()
      .register(miss('a', ExtractionErrorCodes.N_TRANSFORM_NOT_FOUND, 'A'))
      .register(miss('b', ExtractionErrorCodes.GLOBAL_DECLARATIONS_NOT_FOUND, 'B', { referencedName: 'QQ' }));

    const outcome = registry.run(context);
    assert.strictEqual(outcome.matched, false);
    if (!outcome.matched) {
      assert.ok(outcome.error instanceof ExtractionError);
      assert.strictEqual(outcome.error.code, ExtractionErrorCodes.GLOBAL_DECLARATIONS_NOT_FOUND);
      assert.strictEqual(outcome.error.shape, 'B');
      assert.strictEqual(outcome.error.message, 'B missed');
      assert.deepStrictEqual(outcome.error.context, {
        referencedName: 'QQ',
        stage: 'test',
        attempts: [
          { variant: 'a', code: ExtractionErrorCodes.N_TRANSFORM_NOT_FOUND, shape: 'A' },
          { variant: 'b', code: ExtractionErrorCodes.GLOBAL_DECLARATIONS_NOT_FOUND, shape: 'B' },
        ],
      });
    }
  });

  it('uses the empty failure when nothing is registered', () => {
    const outcome = createRegistry().run(context);
    assert.strictEqual(outcome.matched, false);
    if (!outcome.matched) {
      assert.strictEqual(outcome.error.shape, 'EMPTY');
    }
  });

  it('throws on unknown variant names', () => {
    const registry = createRegistry().register(hit('a', 'A'));
    assert.throws(() => registry.run(context, ['a', 'zz']), /Unknown test variant: zz/);
  });
});
