/**
 * Shared Helper Functions
 * Endpoint resolution and diagnostic construction used across rules.
 */

import { findConnector, findInstance } from '../../model/blocks.js';
import { endpointPath, formatEndpoint } from '../../model/paths.js';
import type {
  Causality,
  CompositeBlock,
  Connection,
  Connector,
  Endpoint,
} from '../../types.js';
import type { Diagnostic, DiagnosticLocation, ValidationRule } from '../types.js';

// ============================================================
// ENDPOINT RESOLUTION
// ============================================================

/** Which end of a connection an endpoint sits on */
export type EndpointRole = 'source' | 'destination';

/**
 * Outcome of resolving one endpoint inside a composite.
 * `wrong-causality` means the connector exists but cannot sit on this end.
 */
export type EndpointResolution =
  | { readonly status: 'ok'; readonly path: string; readonly connector: Connector }
  | {
      readonly status: 'wrong-causality';
      readonly path: string;
      readonly connector: Connector;
    }
  | { readonly status: 'unknown-instance'; readonly path: string }
  | { readonly status: 'unknown-connector'; readonly path: string };

/** Both ends of a connection, resolved */
export interface ResolvedConnection {
  readonly connection: Connection;
  readonly from: EndpointResolution;
  readonly to: EndpointResolution;
}

/**
 * Causality an endpoint must have.
 * Boundary sources are parent inputs, child sources are child outputs;
 * destinations are the other way around.
 */
export function expectedCausality(endpoint: Endpoint, role: EndpointRole): Causality {
  const boundary = endpoint.instance === undefined;
  if (role === 'source') return boundary ? 'input' : 'output';
  return boundary ? 'output' : 'input';
}

/**
 * Resolve one endpoint against a composite and its children.
 */
export function resolveEndpoint(
  block: CompositeBlock,
  scopePath: string,
  endpoint: Endpoint,
  role: EndpointRole
): EndpointResolution {
  const path = endpointPath(scopePath, endpoint);
  const causality = expectedCausality(endpoint, role);

  if (endpoint.instance === undefined) {
    return classify(findConnector(block, endpoint.connector), path, causality);
  }

  const child = findInstance(block, endpoint.instance);
  if (!child) return { status: 'unknown-instance', path };
  return classify(findConnector(child.block, endpoint.connector), path, causality);
}

function classify(
  connector: Connector | undefined,
  path: string,
  causality: Causality
): EndpointResolution {
  if (!connector) return { status: 'unknown-connector', path };
  if (connector.causality !== causality) {
    return { status: 'wrong-causality', path, connector };
  }
  return { status: 'ok', path, connector };
}

/**
 * Resolve every connection of a composite.
 */
export function resolveConnections(
  block: CompositeBlock,
  scopePath: string
): ResolvedConnection[] {
  return block.connections.map((connection) => ({
    connection,
    from: resolveEndpoint(block, scopePath, connection.from, 'source'),
    to: resolveEndpoint(block, scopePath, connection.to, 'destination'),
  }));
}

/**
 * Render a connection relative to its composite ("gain.y -> y").
 */
export function describeConnection(connection: Connection): string {
  return `${formatEndpoint(connection.from)} -> ${formatEndpoint(connection.to)}`;
}

// ============================================================
// DIAGNOSTICS
// ============================================================

/**
 * Create a diagnostic at the rule's default severity.
 * The validator applies configured overrides afterwards.
 */
export function createDiagnostic(
  rule: ValidationRule,
  message: string,
  location: DiagnosticLocation,
  related?: readonly string[]
): Diagnostic {
  return {
    severity: rule.severity,
    message,
    location,
    rule: rule.code,
    related,
  };
}

/**
 * Find names that appear more than once, in first-repeat order.
 */
export function findDuplicates(names: readonly string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  return [...duplicates];
}
