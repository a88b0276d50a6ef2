/**
 * Structure Rules Tests
 * Tests: STRUCTURE_EMPTY_NAME, STRUCTURE_INVALID_NAME, STRUCTURE_DUPLICATE_NAME
 */

import { describe, expect, it } from 'vitest';
import {
  defineComposite,
  defineElementary,
  instance,
  validate,
  type Block,
} from '../../../src/index.js';
import { createTestRegistry, Gain } from '../../helpers/model.js';

const registry = createTestRegistry();

function findings(block: Block, rule: string) {
  return validate(block, registry).diagnostics.filter((d) => d.rule === rule);
}

describe('Structure rules', () => {
  describe('STRUCTURE_EMPTY_NAME', () => {
    it('reports blank connector and parameter names', () => {
      const Blank = defineElementary({
        name: 'Blank',
        typeId: 'Gain',
        parameters: [{ name: '', type: 'Real', value: 1 }],
        inputs: [{ name: ' ', type: 'Real' }],
        outputs: [{ name: 'y', type: 'Real' }],
      });

      expect(findings(Blank, 'STRUCTURE_EMPTY_NAME')).toEqual([
        {
          severity: 'error',
          message: 'An input connector in Blank has an empty name',
          location: { path: 'Blank' },
          rule: 'STRUCTURE_EMPTY_NAME',
        },
        {
          severity: 'error',
          message: 'A parameter in Blank has an empty name',
          location: { path: 'Blank' },
          rule: 'STRUCTURE_EMPTY_NAME',
        },
      ]);
    });

    it('reports blank child instance names', () => {
      const Unnamed = defineComposite({
        name: 'Unnamed',
        instances: [instance('', Gain)],
      });

      expect(findings(Unnamed, 'STRUCTURE_EMPTY_NAME').map((d) => d.message)).toEqual([
        'A child instance in Unnamed has an empty name',
      ]);
    });
  });

  describe('STRUCTURE_INVALID_NAME', () => {
    it('rejects an instance name that shadows a nested path', () => {
      const Inner = defineComposite({
        name: 'Inner',
        inputs: [{ name: 'u', type: 'Real' }],
        outputs: [{ name: 'y', type: 'Real' }],
        instances: [instance('g', Gain, { k: 2 })],
        connections: [
          ['u', 'g.u'],
          ['g.y', 'y'],
        ],
      });
      const Shadow = defineComposite({
        name: 'Shadow',
        inputs: [{ name: 'u', type: 'Real' }],
        outputs: [{ name: 'y', type: 'Real' }],
        instances: [instance('s', Inner), instance('s.g', Gain, { k: 10 })],
        connections: [
          ['u', 's.u'],
          { from: { connector: 'u' }, to: { instance: 's.g', connector: 'u' } },
          ['s.y', 'y'],
        ],
      });

      const report = validate(Shadow, registry);
      expect(report.valid).toBe(false);
      expect(findings(Shadow, 'STRUCTURE_INVALID_NAME')).toEqual([
        {
          severity: 'error',
          message: 'Instance name "s.g" in Shadow contains a reserved character',
          location: { path: 'Shadow' },
          rule: 'STRUCTURE_INVALID_NAME',
        },
      ]);
    });

    it('rejects connector names holding a separator', () => {
      const Odd = defineElementary({
        name: 'Odd',
        typeId: 'Gain',
        parameters: [{ name: 'k', type: 'Real', value: 1 }],
        inputs: [{ name: 'u', type: 'Real' }],
        outputs: [
          { name: 'y', type: 'Real' },
          { name: 'y\u0000raw', type: 'Real' },
        ],
      });

      expect(findings(Odd, 'STRUCTURE_INVALID_NAME')).toEqual([
        {
          severity: 'error',
          message: 'Connector name "y\\u0000raw" on Odd contains a reserved character',
          location: { path: 'Odd', connector: 'y\u0000raw' },
          rule: 'STRUCTURE_INVALID_NAME',
        },
      ]);
    });
  });

  describe('STRUCTURE_DUPLICATE_NAME', () => {
    it('reports a connector name shared by an input and an output', () => {
      const Shared = defineElementary({
        name: 'Shared',
        typeId: 'Gain',
        inputs: [{ name: 'u', type: 'Real' }],
        outputs: [{ name: 'u', type: 'Real' }],
      });

      expect(findings(Shared, 'STRUCTURE_DUPLICATE_NAME')).toEqual([
        {
          severity: 'error',
          message: 'Connector "u" is declared more than once on Shared',
          location: { path: 'Shared', connector: 'u' },
          rule: 'STRUCTURE_DUPLICATE_NAME',
        },
      ]);
    });

    it('reports repeated parameters', () => {
      const Repeated = defineElementary({
        name: 'Repeated',
        typeId: 'Constant',
        parameters: [
          { name: 'value', type: 'Real', value: 1 },
          { name: 'value', type: 'Real', value: 2 },
        ],
        outputs: [{ name: 'y', type: 'Real' }],
      });

      expect(findings(Repeated, 'STRUCTURE_DUPLICATE_NAME').map((d) => d.message)).toEqual([
        'Parameter "value" is declared more than once on Repeated',
      ]);
    });

    it('reports repeated child instances at the child path', () => {
      const Doubled = defineComposite({
        name: 'Doubled',
        inputs: [{ name: 'u', type: 'Real' }],
        instances: [instance('g', Gain), instance('g', Gain)],
        connections: [['u', 'g.u']],
      });

      expect(findings(Doubled, 'STRUCTURE_DUPLICATE_NAME')).toEqual([
        {
          severity: 'error',
          message: 'Instance "g" is declared more than once in Doubled',
          location: { path: 'Doubled.g' },
          rule: 'STRUCTURE_DUPLICATE_NAME',
        },
      ]);
    });
  });
});
