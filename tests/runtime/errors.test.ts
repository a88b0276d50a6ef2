/**
 * Error Taxonomy Tests
 * Registry entries, message rendering and error classes.
 */

import { describe, expect, it } from 'vitest';
import {
  AbortError,
  ConfigError,
  ContextStateError,
  createError,
  EngineError,
  ERROR_REGISTRY,
  formatCycle,
  ModelError,
  renderMessage,
  RuntimeError,
} from '../../src/index.js';

describe('Error registry', () => {
  it('uses BF-{category}NNN identifiers matching the category', () => {
    const prefixes = { model: 'M', validation: 'V', runtime: 'R', config: 'C' } as const;
    for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
      expect(errorId).toMatch(/^BF-[MVRC]\d{3}$/);
      expect(errorId.charAt(3)).toBe(prefixes[definition.category]);
    }
  });

  it('looks up definitions by id', () => {
    expect(ERROR_REGISTRY.get('BF-R001')?.description).toBe('Missing input value');
    expect(ERROR_REGISTRY.has('BF-R999')).toBe(false);
  });
});

describe('renderMessage', () => {
  it('replaces placeholders with context values', () => {
    expect(renderMessage('Expected {expected}, got {actual}', { expected: 'Real', actual: 'true' })).toBe(
      'Expected Real, got true'
    );
  });

  it('renders missing values as empty strings', () => {
    expect(renderMessage('Input {path}.{connector}', { path: 'g' })).toBe('Input g.');
  });

  it('coerces non-string values', () => {
    expect(renderMessage('step {step}', { step: 3 })).toBe('step 3');
  });

  it('returns unclosed templates unchanged', () => {
    expect(renderMessage('value {x', { x: 1 })).toBe('value {x');
  });
});

describe('Error classes', () => {
  it('createError renders the registry template', () => {
    const error = createError('BF-R004', { causality: 'input', path: 'plant', connector: 'u' });
    expect(error).toBeInstanceOf(EngineError);
    expect(error.message).toBe('Unknown input connector plant.u');
    expect(error.format()).toBe('[BF-R004] Unknown input connector plant.u');
  });

  it('createError rejects unknown ids', () => {
    expect(() => createError('BF-X001', {})).toThrow('Unknown error ID: BF-X001');
  });

  it('specialized classes check the category', () => {
    expect(() => new RuntimeError('BF-M001', {})).toThrow(
      'Expected runtime error ID, got: BF-M001'
    );
    expect(() => new ModelError('BF-R001', {})).toThrow('Expected model error ID, got: BF-R001');
  });

  it('exposes structured data', () => {
    const error = new ModelError('BF-M002', { endpoint: 'a.b.c' }, 'Plant');
    expect(error.toData()).toEqual({
      errorId: 'BF-M002',
      message: 'Invalid connection endpoint "a.b.c"',
      path: 'Plant',
      context: { endpoint: 'a.b.c' },
    });
    expect(error.format((data) => `${data.errorId}@${data.path ?? ''}`)).toBe('BF-M002@Plant');
  });

  it('ContextStateError carries operation and state', () => {
    const error = new ContextStateError('step', 'faulted', 'Plant');
    expect(error).toBeInstanceOf(RuntimeError);
    expect(error.errorId).toBe('BF-R005');
    expect(error.operation).toBe('step');
    expect(error.state).toBe('faulted');
    expect(error.message).toBe('Cannot step: context is faulted');
  });

  it('AbortError names the step and instance', () => {
    const error = new AbortError(2, 'Plant.gain');
    expect(error.message).toBe('Step 2 aborted before evaluating Plant.gain');
    expect(error.path).toBe('Plant.gain');
  });

  it('ConfigError uses the config category', () => {
    const error = new ConfigError('BF-C001', { reason: 'bad' });
    expect(error.name).toBe('ConfigError');
    expect(error.message).toBe('Invalid configuration: bad');
  });

  it('formatCycle closes the loop', () => {
    expect(formatCycle(['a', 'b'])).toBe('a -> b -> a');
    expect(formatCycle([])).toBe('');
  });
});
