/**
 * Connection Rules Tests
 * Tests: CONNECTION_UNKNOWN_ENDPOINT, CONNECTION_ILLEGAL_SHAPE, INPUT_MULTIPLE_SOURCES,
 * OUTPUT_UNCONNECTED, CONNECTION_TYPE_MISMATCH, CONNECTION_UNIT_MISMATCH
 */

import { describe, expect, it } from 'vitest';
import {
  createImplementationRegistry,
  defineComposite,
  defineElementary,
  instance,
  mergeRegistries,
  validate,
  type Block,
  type ValidateOptions,
} from '../../../src/index.js';
import { Comparator, createTestRegistry, Gain } from '../../helpers/model.js';

const Sensor = defineElementary({
  name: 'Sensor',
  outputs: [{ name: 't', type: 'Real', unit: 'K' }],
});

const Display = defineElementary({
  name: 'Display',
  inputs: [{ name: 't', type: 'Real', unit: 'degC' }],
});

const Ticks = defineElementary({
  name: 'Ticks',
  outputs: [{ name: 'n', type: 'Integer' }],
});

const registry = mergeRegistries(
  createTestRegistry(),
  createImplementationRegistry({
    Sensor: () => ({ t: 293.15 }),
    Display: () => ({}),
    Ticks: ({ step }) => ({ n: step }),
  })
);

function findings(block: Block, rule: string, options?: ValidateOptions) {
  return validate(block, registry, options).diagnostics.filter((d) => d.rule === rule);
}

describe('Connection rules', () => {
  describe('CONNECTION_UNKNOWN_ENDPOINT', () => {
    const Dangling = defineComposite({
      name: 'Dangling',
      inputs: [{ name: 'u', type: 'Real' }],
      outputs: [{ name: 'y', type: 'Real' }],
      instances: [instance('gain', Gain)],
      connections: [
        ['u', 'gain.u'],
        ['gain.y', 'y'],
        ['ghost.y', 'gain.v'],
      ],
    });

    it('reports unknown instances and connectors', () => {
      expect(findings(Dangling, 'CONNECTION_UNKNOWN_ENDPOINT')).toEqual([
        {
          severity: 'error',
          message: 'Connection ghost.y -> gain.v in Dangling references unknown instance "ghost"',
          location: { path: 'Dangling' },
          rule: 'CONNECTION_UNKNOWN_ENDPOINT',
        },
        {
          severity: 'error',
          message: 'Connection ghost.y -> gain.v in Dangling references unknown connector "gain.v"',
          location: { path: 'Dangling.gain', connector: 'v' },
          rule: 'CONNECTION_UNKNOWN_ENDPOINT',
        },
      ]);
    });

    it('reports unknown boundary connectors', () => {
      const Boundary = defineComposite({
        name: 'Boundary',
        instances: [instance('gain', Gain)],
        connections: [['w', 'gain.u']],
      });
      expect(findings(Boundary, 'CONNECTION_UNKNOWN_ENDPOINT').map((d) => d.message)).toEqual([
        'Connection w -> gain.u in Boundary references unknown connector "w"',
      ]);
    });
  });

  describe('CONNECTION_ILLEGAL_SHAPE', () => {
    it('rejects a block input feeding a block output', () => {
      const Bypass = defineComposite({
        name: 'Bypass',
        inputs: [{ name: 'u', type: 'Real' }],
        outputs: [{ name: 'y', type: 'Real' }],
        instances: [instance('g', Gain)],
        connections: [
          ['u', 'g.u'],
          ['g.y', 'y'],
          ['u', 'y'],
        ],
      });

      expect(findings(Bypass, 'CONNECTION_ILLEGAL_SHAPE')).toEqual([
        {
          severity: 'error',
          message:
            'Connection u -> y in Bypass is not allowed: a block input cannot feed a block output directly',
          location: { path: 'Bypass', connector: 'u' },
          rule: 'CONNECTION_ILLEGAL_SHAPE',
        },
      ]);
      expect(findings(Bypass, 'INPUT_MULTIPLE_SOURCES').map((d) => d.message)).toEqual([
        'Bypass.y has 2 sources: g.y, u',
      ]);
    });

    it('rejects a child output as destination', () => {
      const Backwards = defineComposite({
        name: 'Backwards',
        inputs: [{ name: 'u', type: 'Real' }],
        instances: [instance('g', Gain)],
        connections: [
          ['u', 'g.u'],
          ['u', 'g.y'],
        ],
      });

      expect(findings(Backwards, 'CONNECTION_ILLEGAL_SHAPE')).toEqual([
        {
          severity: 'error',
          message:
            'Connection u -> g.y in Backwards is not allowed: a child output cannot be a destination',
          location: { path: 'Backwards.g', connector: 'y' },
          rule: 'CONNECTION_ILLEGAL_SHAPE',
        },
      ]);
    });

    it('rejects reading the block output inside the block', () => {
      const Echo = defineComposite({
        name: 'Echo',
        outputs: [{ name: 'y', type: 'Real' }],
        instances: [instance('g', Gain)],
        connections: [
          ['y', 'g.u'],
          ['g.y', 'y'],
        ],
      });

      expect(findings(Echo, 'CONNECTION_ILLEGAL_SHAPE').map((d) => d.message)).toEqual([
        'Connection y -> g.u in Echo is not allowed: a block output cannot be read inside the block',
      ]);
    });

    it('rejects a child input as source', () => {
      const Tap = defineComposite({
        name: 'Tap',
        inputs: [{ name: 'u', type: 'Real' }],
        instances: [instance('g', Gain), instance('h', Gain)],
        connections: [
          ['u', 'g.u'],
          ['g.u', 'h.u'],
        ],
      });

      expect(findings(Tap, 'CONNECTION_ILLEGAL_SHAPE').map((d) => d.message)).toEqual([
        'Connection g.u -> h.u in Tap is not allowed: a child input cannot be a source',
      ]);
    });
  });

  describe('INPUT_MULTIPLE_SOURCES', () => {
    it('reports inputs fed twice', () => {
      const Twice = defineComposite({
        name: 'Twice',
        inputs: [
          { name: 'a', type: 'Real' },
          { name: 'b', type: 'Real' },
        ],
        instances: [instance('g', Gain)],
        connections: [
          ['a', 'g.u'],
          ['b', 'g.u'],
        ],
      });

      expect(findings(Twice, 'INPUT_MULTIPLE_SOURCES')).toEqual([
        {
          severity: 'error',
          message: 'Twice.g.u has 2 sources: a, b',
          location: { path: 'Twice.g', connector: 'u' },
          rule: 'INPUT_MULTIPLE_SOURCES',
        },
      ]);
    });
  });

  describe('OUTPUT_UNCONNECTED', () => {
    it('reports outputs without a child output source', () => {
      const Hollow = defineComposite({
        name: 'Hollow',
        inputs: [{ name: 'u', type: 'Real' }],
        outputs: [
          { name: 'y', type: 'Real' },
          { name: 'z', type: 'Real' },
        ],
        instances: [instance('g', Gain)],
        connections: [
          ['u', 'g.u'],
          ['g.y', 'y'],
        ],
      });

      expect(findings(Hollow, 'OUTPUT_UNCONNECTED')).toEqual([
        {
          severity: 'error',
          message: 'Output Hollow.z has no child output source',
          location: { path: 'Hollow', connector: 'z' },
          rule: 'OUTPUT_UNCONNECTED',
        },
      ]);
    });
  });

  describe('CONNECTION_TYPE_MISMATCH', () => {
    const Mixed = defineComposite({
      name: 'Mixed',
      inputs: [
        { name: 'a', type: 'Real' },
        { name: 'b', type: 'Real' },
      ],
      outputs: [{ name: 'y', type: 'Real' }],
      instances: [instance('cmp', Comparator), instance('g', Gain)],
      connections: [
        ['a', 'cmp.a'],
        ['b', 'cmp.b'],
        ['cmp.y', 'g.u'],
        ['g.y', 'y'],
      ],
    });

    const Counter = defineComposite({
      name: 'Counter',
      outputs: [{ name: 'y', type: 'Real' }],
      instances: [instance('ticks', Ticks), instance('g', Gain)],
      connections: [
        ['ticks.n', 'g.u'],
        ['g.y', 'y'],
      ],
    });

    it('reports incompatible types', () => {
      expect(findings(Mixed, 'CONNECTION_TYPE_MISMATCH')).toEqual([
        {
          severity: 'error',
          message: 'Connection cmp.y -> g.u in Mixed connects Boolean to finite Real',
          location: { path: 'Mixed.g', connector: 'u' },
          rule: 'CONNECTION_TYPE_MISMATCH',
        },
      ]);
    });

    it('allows Integer into Real by default', () => {
      expect(validate(Counter, registry).valid).toBe(true);
    });

    it('follows the configured compatible types', () => {
      expect(
        findings(Counter, 'CONNECTION_TYPE_MISMATCH', { config: { compatibleTypes: [] } }).map(
          (d) => d.message
        )
      ).toEqual(['Connection ticks.n -> g.u in Counter connects Integer to finite Real']);
    });
  });

  describe('CONNECTION_UNIT_MISMATCH', () => {
    const Plant = defineComposite({
      name: 'Plant',
      instances: [instance('sensor', Sensor), instance('display', Display)],
      connections: [['sensor.t', 'display.t']],
    });

    it('warns about differing units without failing validation', () => {
      const report = validate(Plant, registry);
      expect(report.valid).toBe(true);
      expect(report.warnings).toEqual([
        {
          severity: 'warning',
          message: 'Connection sensor.t -> display.t in Plant connects unit "K" to unit "degC"',
          location: { path: 'Plant.display', connector: 't' },
          rule: 'CONNECTION_UNIT_MISMATCH',
        },
      ]);
    });

    it('can be turned off', () => {
      const report = validate(Plant, registry, {
        config: { rules: { CONNECTION_UNIT_MISMATCH: 'off' } },
      });
      expect(report.diagnostics).toEqual([]);
    });

    it('can be raised to an error', () => {
      const report = validate(Plant, registry, {
        config: { severity: { CONNECTION_UNIT_MISMATCH: 'error' } },
      });
      expect(report.valid).toBe(false);
      expect(report.errors.map((d) => d.rule)).toEqual(['CONNECTION_UNIT_MISMATCH']);
    });
  });
});
