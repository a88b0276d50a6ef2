/**
 * Instance Paths
 *
 * Qualified instance paths join a parent path and a child name with ".".
 * The root instance path is the root block's name.
 */

import type { Endpoint } from '../types.js';

/** Separator between path segments */
export const PATH_SEPARATOR = '.';

/**
 * Join a parent path and a child instance name.
 */
export function childPath(parent: string, child: string): string {
  return `${parent}${PATH_SEPARATOR}${child}`;
}

/**
 * Qualified path of the instance an endpoint sits on.
 * Boundary endpoints (no instance) resolve to the enclosing path.
 */
export function endpointPath(scopePath: string, endpoint: Endpoint): string {
  return endpoint.instance === undefined
    ? scopePath
    : childPath(scopePath, endpoint.instance);
}

/**
 * Render an endpoint relative to its composite ("gain.u" or "u").
 */
export function formatEndpoint(endpoint: Endpoint): string {
  return endpoint.instance === undefined
    ? endpoint.connector
    : `${endpoint.instance}${PATH_SEPARATOR}${endpoint.connector}`;
}

/**
 * Check whether `path` equals `ancestor` or lies beneath it.
 */
export function isWithinPath(path: string, ancestor: string): boolean {
  return path === ancestor || path.startsWith(ancestor + PATH_SEPARATOR);
}

/**
 * Key for signal maps: path and connector joined by a NUL character so
 * neither part can collide with the other.
 */
export function signalKey(path: string, connector: string): string {
  return `${path}\u0000${connector}`;
}
