/**
 * Structure Rules
 * Names must be non-empty, free of path separators and unique within their
 * scope, since instance paths and signal keys are built from them.
 */

import { childPath, PATH_SEPARATOR } from '../../model/paths.js';
import { isComposite } from '../../types.js';
import type {
  BlockScope,
  Diagnostic,
  ValidationContext,
  ValidationRule,
} from '../types.js';
import { createDiagnostic, findDuplicates } from './helpers.js';

// ============================================================
// STRUCTURE_EMPTY_NAME RULE
// ============================================================

/**
 * Block, instance, connector and parameter names must not be empty.
 */
export const STRUCTURE_EMPTY_NAME: ValidationRule = {
  code: 'STRUCTURE_EMPTY_NAME',
  category: 'structure',
  severity: 'error',
  mandatory: true,
  kinds: ['elementary', 'composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const { block, path } = scope;
    const diagnostics: Diagnostic[] = [];
    const report = (what: string): void => {
      diagnostics.push(
        createDiagnostic(STRUCTURE_EMPTY_NAME, `${what} in ${path} has an empty name`, {
          path,
        })
      );
    };

    if (isBlank(block.name)) report('Block definition');
    for (const connector of [...block.inputs, ...block.outputs]) {
      if (isBlank(connector.name)) report(`An ${connector.causality} connector`);
    }
    for (const param of block.parameters) {
      if (isBlank(param.name)) report('A parameter');
    }
    if (isComposite(block)) {
      for (const child of block.instances) {
        if (isBlank(child.name)) report('A child instance');
      }
    }

    return diagnostics;
  },
};

// ============================================================
// STRUCTURE_INVALID_NAME RULE
// ============================================================

/** Characters that would make two instance paths or signal keys collide */
const RESERVED_CHARACTERS = [PATH_SEPARATOR, '\u0000'];

/**
 * Child instance and connector names must not contain the path separator
 * or the signal key separator. "s.g" as a sibling of composite "s" would
 * otherwise share the path of the child "g" inside "s".
 */
export const STRUCTURE_INVALID_NAME: ValidationRule = {
  code: 'STRUCTURE_INVALID_NAME',
  category: 'structure',
  severity: 'error',
  mandatory: true,
  kinds: ['elementary', 'composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const { block, path } = scope;
    const diagnostics: Diagnostic[] = [];

    for (const connector of [...block.inputs, ...block.outputs]) {
      if (hasReservedCharacter(connector.name)) {
        diagnostics.push(
          createDiagnostic(
            STRUCTURE_INVALID_NAME,
            `Connector name ${JSON.stringify(connector.name)} on ${path} contains a reserved character`,
            { path, connector: connector.name }
          )
        );
      }
    }

    if (isComposite(block)) {
      for (const child of block.instances) {
        if (hasReservedCharacter(child.name)) {
          diagnostics.push(
            createDiagnostic(
              STRUCTURE_INVALID_NAME,
              `Instance name ${JSON.stringify(child.name)} in ${path} contains a reserved character`,
              { path }
            )
          );
        }
      }
    }

    return diagnostics;
  },
};

// ============================================================
// STRUCTURE_DUPLICATE_NAME RULE
// ============================================================

/**
 * Names must be unique within one scope:
 * - connectors across inputs and outputs (signals are keyed by name alone)
 * - parameters
 * - child instances of a composite
 */
export const STRUCTURE_DUPLICATE_NAME: ValidationRule = {
  code: 'STRUCTURE_DUPLICATE_NAME',
  category: 'structure',
  severity: 'error',
  mandatory: true,
  kinds: ['elementary', 'composite'],

  check(scope: BlockScope, _context: ValidationContext): Diagnostic[] {
    const { block, path } = scope;
    const diagnostics: Diagnostic[] = [];

    const connectors = [...block.inputs, ...block.outputs].map((c) => c.name);
    for (const name of findDuplicates(connectors)) {
      diagnostics.push(
        createDiagnostic(
          STRUCTURE_DUPLICATE_NAME,
          `Connector "${name}" is declared more than once on ${path}`,
          { path, connector: name }
        )
      );
    }

    for (const name of findDuplicates(block.parameters.map((p) => p.name))) {
      diagnostics.push(
        createDiagnostic(
          STRUCTURE_DUPLICATE_NAME,
          `Parameter "${name}" is declared more than once on ${path}`,
          { path, parameter: name }
        )
      );
    }

    if (isComposite(block)) {
      for (const name of findDuplicates(block.instances.map((c) => c.name))) {
        diagnostics.push(
          createDiagnostic(
            STRUCTURE_DUPLICATE_NAME,
            `Instance "${name}" is declared more than once in ${path}`,
            { path: childPath(path, name) }
          )
        );
      }
    }

    return diagnostics;
  },
};

function hasReservedCharacter(name: string): boolean {
  return RESERVED_CHARACTERS.some((c) => name.includes(c));
}

function isBlank(name: string): boolean {
  return name.trim().length === 0;
}
