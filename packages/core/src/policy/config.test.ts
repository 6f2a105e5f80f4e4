/**
 * Tests for Policy Configuration
 */

import { describe, expect } from 'vitest';
import { it } from '@fast-check/vitest';
import * as fc from 'fast-check';
import {
  createPolicyConfig,
  emptyPolicyConfig,
  isEmptyPolicyConfig,
  mergePolicyConfigs,
} from './config.js';
import type { PartialPolicyConfig } from './types.js';

const pathArb = fc.oneof(
  fc.constantFrom('/etc/', '~/.ssh', '*.lock', '.env*', 'README*', 'C:\\Windows\\'),
  fc.string({ minLength: 1, maxLength: 20 }),
);

const partialArb: fc.Arbitrary<PartialPolicyConfig> = fc.record({
  genericRules: fc.array(
    fc.record({
      pattern: fc.string({ minLength: 1, maxLength: 20 }),
      reason: fc.string({ minLength: 1, maxLength: 20 }),
      ask: fc.boolean(),
    }),
    { maxLength: 5 },
  ),
  zeroAccessPaths: fc.array(pathArb, { maxLength: 5 }),
  readOnlyPaths: fc.array(pathArb, { maxLength: 5 }),
  noDeletePaths: fc.array(pathArb, { maxLength: 5 }),
});

describe('policy config', () => {
  describe('createPolicyConfig', () => {
    it('classifies each path once', () => {
      const config = createPolicyConfig({
        zeroAccessPaths: ['~/.ssh', '*.pem'],
      });

      expect(config.zeroAccessPaths).toEqual([
        { kind: 'literal', source: '~/.ssh' },
        { kind: 'glob', source: '*.pem' },
      ]);
      expect(config.readOnlyPaths).toEqual([]);
    });

    it('freezes the result deeply', () => {
      const config = createPolicyConfig({
        genericRules: [{ pattern: 'sudo', reason: 'root', ask: true }],
        readOnlyPaths: ['/etc/'],
      });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.genericRules)).toBe(true);
      expect(Object.isFrozen(config.genericRules[0])).toBe(true);
      expect(Object.isFrozen(config.readOnlyPaths[0])).toBe(true);
    });

    it('does not share arrays with the partial source', () => {
      const partial: PartialPolicyConfig = { noDeletePaths: ['.git/'] };
      const config = createPolicyConfig(partial);
      partial.noDeletePaths?.push('README*');

      expect(config.noDeletePaths).toHaveLength(1);
    });

    it('treats a missing source as empty', () => {
      expect(isEmptyPolicyConfig(createPolicyConfig())).toBe(true);
      expect(isEmptyPolicyConfig(emptyPolicyConfig())).toBe(true);
      expect(
        isEmptyPolicyConfig(createPolicyConfig({ readOnlyPaths: ['/etc/'] })),
      ).toBe(false);
    });
  });

  describe('mergePolicyConfigs', () => {
    it('puts base entries before overlay entries', () => {
      const base = createPolicyConfig({
        genericRules: [{ pattern: 'a', reason: 'base', ask: false }],
        readOnlyPaths: ['/etc/'],
      });
      const overlay = createPolicyConfig({
        genericRules: [{ pattern: 'a', reason: 'overlay', ask: true }],
        readOnlyPaths: ['/usr/'],
      });

      const merged = mergePolicyConfigs(base, overlay);

      expect(merged.genericRules.map((rule) => rule.reason)).toEqual([
        'base',
        'overlay',
      ]);
      expect(merged.readOnlyPaths.map((pattern) => pattern.source)).toEqual([
        '/etc/',
        '/usr/',
      ]);
      expect(Object.isFrozen(merged)).toBe(true);
    });

    it('leaves both inputs untouched', () => {
      const base = createPolicyConfig({ noDeletePaths: ['.git/'] });
      const overlay = createPolicyConfig({ noDeletePaths: ['README*'] });

      mergePolicyConfigs(base, overlay);

      expect(base.noDeletePaths).toHaveLength(1);
      expect(overlay.noDeletePaths).toHaveLength(1);
    });

    it.prop([partialArb, partialArb])(
      'concatenates every field, base first',
      (basePartial, overlayPartial) => {
        const base = createPolicyConfig(basePartial);
        const overlay = createPolicyConfig(overlayPartial);
        const merged = mergePolicyConfigs(base, overlay);

        expect(merged.genericRules).toEqual([
          ...base.genericRules,
          ...overlay.genericRules,
        ]);
        expect(merged.zeroAccessPaths).toEqual([
          ...base.zeroAccessPaths,
          ...overlay.zeroAccessPaths,
        ]);
        expect(merged.readOnlyPaths).toEqual([
          ...base.readOnlyPaths,
          ...overlay.readOnlyPaths,
        ]);
        expect(merged.noDeletePaths).toEqual([
          ...base.noDeletePaths,
          ...overlay.noDeletePaths,
        ]);
      },
    );

    it.prop([partialArb])('has the empty config as identity', (partial) => {
      const config = createPolicyConfig(partial);

      expect(mergePolicyConfigs(emptyPolicyConfig(), config)).toEqual(config);
      expect(mergePolicyConfigs(config, emptyPolicyConfig())).toEqual(config);
    });
  });
});
