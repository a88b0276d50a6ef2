/**
 * Dependency Graph Tests
 */

import { describe, expect, it } from 'vitest';
import {
  buildDependencyGraph,
  defineComposite,
  instance,
  ModelError,
} from '../../src/index.js';
import { Gain, Loop, Scaler, Sum } from '../helpers/model.js';

const Chain = defineComposite({
  name: 'Chain',
  inputs: [{ name: 'u', type: 'Real' }],
  outputs: [{ name: 'y', type: 'Real' }],
  instances: [instance('b', Gain), instance('a', Gain)],
  connections: [
    ['u', 'a.u'],
    ['a.y', 'b.u'],
    ['b.y', 'y'],
  ],
});

describe('buildDependencyGraph', () => {
  it('lists child paths in declaration order', () => {
    const graph = buildDependencyGraph(Chain, 'Chain');
    expect(graph.scope).toBe('Chain');
    expect(graph.nodes).toEqual(['Chain.b', 'Chain.a']);
  });

  it('records an edge for each sibling output feeding an input', () => {
    const graph = buildDependencyGraph(Chain, 'Chain');
    expect([...(graph.dependencies.get('Chain.b') ?? [])]).toEqual(['Chain.a']);
    expect([...(graph.dependencies.get('Chain.a') ?? [])]).toEqual([]);
    expect([...(graph.dependents.get('Chain.a') ?? [])]).toEqual(['Chain.b']);
  });

  it('ignores boundary connections', () => {
    const graph = buildDependencyGraph(Scaler, 'Scaler');
    expect(graph.nodes).toEqual(['Scaler.gain']);
    expect(graph.dependencies.get('Scaler.gain')?.size).toBe(0);
  });

  it('qualifies nodes with the scope path', () => {
    const graph = buildDependencyGraph(Loop, 'Plant.loop');
    expect(graph.nodes).toEqual(['Plant.loop.a', 'Plant.loop.b']);
    expect([...(graph.dependencies.get('Plant.loop.a') ?? [])]).toEqual(['Plant.loop.b']);
  });

  describe('unresolved references', () => {
    const Dangling = defineComposite({
      name: 'Dangling',
      inputs: [{ name: 'u', type: 'Real' }],
      outputs: [{ name: 'y', type: 'Real' }],
      instances: [instance('s', Sum)],
      connections: [
        ['u', 's.a'],
        ['ghost.y', 's.b'],
        ['s.y', 'y'],
      ],
    });

    it('throws for unknown instances', () => {
      expect(() => buildDependencyGraph(Dangling, 'Dangling')).toThrow(ModelError);
      expect(() => buildDependencyGraph(Dangling, 'Dangling')).toThrow(
        'Connection in Dangling references unknown instance "ghost"'
      );
    });

    it('skips them when asked to', () => {
      const graph = buildDependencyGraph(Dangling, 'Dangling', { ignoreUnresolved: true });
      expect(graph.nodes).toEqual(['Dangling.s']);
      expect(graph.dependencies.get('Dangling.s')?.size).toBe(0);
    });

    it('names unknown connectors with their instance', () => {
      const Misnamed = defineComposite({
        name: 'Misnamed',
        instances: [instance('g', Gain), instance('h', Gain)],
        connections: [['g.out', 'h.u']],
      });
      expect(() => buildDependencyGraph(Misnamed, 'Misnamed')).toThrow(
        'Connection in Misnamed references unknown connector "g.out"'
      );
    });
  });
});
