/**
 * Block Model Types
 * Immutable descriptions of blocks, connectors, parameters and connections.
 */

// ============================================================
// SIGNAL TYPES
// ============================================================

/** Type names a connector or parameter may carry */
export const SIGNAL_TYPES = [
  'Real',
  'Integer',
  'Boolean',
  'String',
  'Enumeration',
] as const;

export type SignalTypeName = (typeof SIGNAL_TYPES)[number];

/** Runtime value bound to one connector or parameter */
export type SignalValue = number | boolean | string;

/** Connector direction */
export type Causality = 'input' | 'output';

// ============================================================
// CONNECTORS AND PARAMETERS
// ============================================================

/**
 * Typed terminal on a block.
 * Unit and bound metadata are only read by the validator.
 */
export interface Connector {
  readonly name: string;
  readonly type: SignalTypeName;
  readonly causality: Causality;
  /** Physical quantity (e.g., "ThermodynamicTemperature") */
  readonly quantity?: string | undefined;
  /** Unit of measurement (e.g., "K") */
  readonly unit?: string | undefined;
  readonly min?: number | undefined;
  readonly max?: number | undefined;
  readonly nominal?: number | undefined;
  /** Seeded into the signal table by initialize() */
  readonly start?: SignalValue | undefined;
  /** Members of an Enumeration connector */
  readonly literals?: readonly string[] | undefined;
  readonly description?: string | undefined;
}

/**
 * Constant-per-instance value.
 * A parameter without `value` is required and must be overridden by every instance.
 */
export interface Parameter {
  readonly name: string;
  readonly type: SignalTypeName;
  readonly value?: SignalValue | undefined;
  readonly min?: number | undefined;
  readonly max?: number | undefined;
  readonly unit?: string | undefined;
  readonly literals?: readonly string[] | undefined;
  readonly description?: string | undefined;
}

// ============================================================
// CONNECTIONS
// ============================================================

/**
 * One end of a connection.
 * Without `instance` the endpoint is the enclosing composite's own connector.
 */
export interface Endpoint {
  readonly instance?: string | undefined;
  readonly connector: string;
}

/** Directed edge from a source connector to a destination connector */
export interface Connection {
  readonly from: Endpoint;
  readonly to: Endpoint;
  readonly description?: string | undefined;
}

// ============================================================
// BLOCKS
// ============================================================

export type BlockKind = 'elementary' | 'composite';

interface BlockBase {
  readonly kind: BlockKind;
  /** Definition name; also the root instance path */
  readonly name: string;
  /** Identifier used for implementation lookup */
  readonly typeId: string;
  readonly parameters: readonly Parameter[];
  readonly inputs: readonly Connector[];
  readonly outputs: readonly Connector[];
  readonly description?: string | undefined;
}

/** Block whose behavior comes from a registered implementation */
export interface ElementaryBlock extends BlockBase {
  readonly kind: 'elementary';
}

/** Block defined by child instances and internal connections */
export interface CompositeBlock extends BlockBase {
  readonly kind: 'composite';
  readonly instances: readonly BlockInstance[];
  readonly connections: readonly Connection[];
}

export type Block = ElementaryBlock | CompositeBlock;

/** Named use of a block definition inside a composite */
export interface BlockInstance {
  readonly name: string;
  readonly block: Block;
  /** Instantiation-time parameter overrides */
  readonly parameters?: Readonly<Record<string, SignalValue>> | undefined;
}

// ============================================================
// TYPE GUARDS
// ============================================================

export function isComposite(block: Block): block is CompositeBlock {
  return block.kind === 'composite';
}

export function isElementary(block: Block): block is ElementaryBlock {
  return block.kind === 'elementary';
}

export function isSignalTypeName(value: unknown): value is SignalTypeName {
  return (
    typeof value === 'string' &&
    SIGNAL_TYPES.some((name) => name === value)
  );
}
