/**
 * Move Table Checker - Validates the group structure of the move tables
 *
 * Runs once when the registry loads (and directly from tests). The tables
 * are the engine's only guarantee of correctness, so any error here makes
 * the registry refuse to load.
 *
 * Rules validated:
 * 1. move-table:complete - exactly one table for each of the 12 moves
 * 2. move-table:cycle-shape - three disjoint cycles of length 4
 * 3. move-table:working-set - 12 distinct addresses: 4 on the turned face,
 *    2 on each of its four neighbors, none on the opposite face
 * 4. move-table:transfers - the precomputed transfers are a permutation of
 *    the working set and agree with the cycles
 * 5. move-table:inverse - clockwise then counter-clockwise is the identity
 * 6. move-table:order-four - four applications of a move are the identity
 * 7. move-table:coverage - the tables together reach all 24 addresses
 * 8. move-table:opposites-disjoint - opposite faces touch disjoint sets
 * 9. move-table:geometry - each table equals a quarter turn of the 3D
 *    sticker layout about the face normal
 */

import {
  ALL_FACES,
  FACELET_COUNT,
  OPPOSITE_FACE,
  type Face,
  type Move,
  type MoveTable,
} from '../types';
import { ALL_ADDRESSES, addressIndex, addressKey } from '../addresses';
import { MoveTableError } from '../errors';
import {
  findAddressAt,
  getStickerPlacement,
  getTurnRotation,
  isInTurnLayer,
  rotatePlacement,
} from '../../geometry/stickerLayout';

// =============================================================================
// Types
// =============================================================================

export type MoveTableRuleId =
  | 'move-table:complete'
  | 'move-table:cycle-shape'
  | 'move-table:working-set'
  | 'move-table:transfers'
  | 'move-table:inverse'
  | 'move-table:order-four'
  | 'move-table:coverage'
  | 'move-table:opposites-disjoint'
  | 'move-table:geometry';

export interface MoveTableValidationError {
  rule: MoveTableRuleId;
  message: string;
  details: {
    move?: string;
    address?: string;
    [key: string]: unknown;
  };
}

export interface MoveTableCheckResult {
  valid: boolean;
  errors: MoveTableValidationError[];
  summary: {
    rulesChecked: MoveTableRuleId[];
    errorCount: number;
    tableCount: number;
  };
}

// =============================================================================
// Constants
// =============================================================================

const MOVES_PER_FACE = 2;
const CYCLES_PER_TABLE = 3;
const CYCLE_LENGTH = 4;
const WORKING_SET_SIZE = CYCLES_PER_TABLE * CYCLE_LENGTH;
const FACELETS_PER_NEIGHBOR = 2;

// =============================================================================
// Permutation helpers
// =============================================================================

const identity = (): number[] => Array.from({ length: FACELET_COUNT }, (_, i) => i);

/** Move the labels in `labels` the way the table moves colors */
function permute(labels: readonly number[], table: MoveTable): number[] {
  const next = labels.slice();
  for (const [from, to] of table.transfers) {
    next[to] = labels[from];
  }
  return next;
}

function isIdentity(labels: readonly number[]): boolean {
  return labels.every((label, index) => label === index);
}

const label = (m: Move): string => `${m.face}:${m.direction}`;

// =============================================================================
// Move Table Checker
// =============================================================================

export class MoveTableChecker {
  private errors: MoveTableValidationError[] = [];
  private rulesChecked = new Set<MoveTableRuleId>();

  constructor(private tables: readonly MoveTable[]) {}

  validateAll(): MoveTableCheckResult {
    this.errors = [];
    this.rulesChecked.clear();

    this.validateCompleteness();
    for (const table of this.tables) {
      this.validateCycleShape(table);
      this.validateWorkingSet(table);
      this.validateTransfers(table);
      this.validateOrderFour(table);
      this.validateGeometry(table);
    }
    this.validateInverses();
    this.validateCoverage();
    this.validateOppositesDisjoint();

    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      summary: {
        rulesChecked: Array.from(this.rulesChecked),
        errorCount: this.errors.length,
        tableCount: this.tables.length,
      },
    };
  }

  private addError(rule: MoveTableRuleId, message: string, details: MoveTableValidationError['details'] = {}): void {
    this.rulesChecked.add(rule);
    this.errors.push({ rule, message, details });
  }

  private markRuleChecked(rule: MoveTableRuleId): void {
    this.rulesChecked.add(rule);
  }

  private findTable(face: Face, direction: Move['direction']): MoveTable | undefined {
    return this.tables.find((t) => t.move.face === face && t.move.direction === direction);
  }

  // ===========================================================================
  // Rules
  // ===========================================================================

  private validateCompleteness(): void {
    this.markRuleChecked('move-table:complete');
    const expected = ALL_FACES.length * MOVES_PER_FACE;
    if (this.tables.length !== expected) {
      this.addError('move-table:complete', `Expected ${expected} tables, found ${this.tables.length}`);
    }
    for (const face of ALL_FACES) {
      for (const direction of ['cw', 'ccw'] as const) {
        const count = this.tables.filter((t) => t.move.face === face && t.move.direction === direction).length;
        if (count !== 1) {
          this.addError('move-table:complete', `Move ${face}:${direction} has ${count} tables`, {
            move: `${face}:${direction}`,
          });
        }
      }
    }
  }

  private validateCycleShape(table: MoveTable): void {
    this.markRuleChecked('move-table:cycle-shape');
    const move = label(table.move);
    if (table.cycles.length !== CYCLES_PER_TABLE) {
      this.addError('move-table:cycle-shape', `${move} has ${table.cycles.length} cycles`, { move });
    }
    table.cycles.forEach((cycle, index) => {
      if (cycle.length !== CYCLE_LENGTH) {
        this.addError('move-table:cycle-shape', `${move} cycle ${index} has length ${cycle.length}`, {
          move,
          cycleIndex: index,
        });
      }
    });
  }

  private validateWorkingSet(table: MoveTable): void {
    this.markRuleChecked('move-table:working-set');
    const move = label(table.move);
    const turned = table.move.face;
    const addresses = table.cycles.flat();
    const keys = new Set(addresses.map(addressKey));

    if (keys.size !== addresses.length) {
      this.addError('move-table:working-set', `${move} lists an address more than once`, { move });
    }
    if (keys.size !== WORKING_SET_SIZE) {
      this.addError('move-table:working-set', `${move} touches ${keys.size} addresses`, { move });
    }

    const perFace = new Map<Face, number>();
    for (const address of addresses) {
      perFace.set(address.face, (perFace.get(address.face) ?? 0) + 1);
    }
    for (const face of ALL_FACES) {
      const count = perFace.get(face) ?? 0;
      const expected =
        face === turned ? CYCLE_LENGTH : face === OPPOSITE_FACE[turned] ? 0 : FACELETS_PER_NEIGHBOR;
      if (count !== expected) {
        this.addError('move-table:working-set', `${move} touches ${count} facelets on ${face}, expected ${expected}`, {
          move,
          face,
        });
      }
    }
  }

  private validateTransfers(table: MoveTable): void {
    this.markRuleChecked('move-table:transfers');
    const move = label(table.move);
    const expected = new Map<number, number>();
    for (const cycle of table.cycles) {
      cycle.forEach((address, i) => {
        expected.set(addressIndex(address), addressIndex(cycle[(i + 1) % cycle.length]));
      });
    }

    const sources = new Set(table.transfers.map(([from]) => from));
    const targets = new Set(table.transfers.map(([, to]) => to));
    if (sources.size !== table.transfers.length || targets.size !== table.transfers.length) {
      this.addError('move-table:transfers', `${move} transfers are not a permutation`, { move });
      return;
    }
    for (const [from, to] of table.transfers) {
      if (expected.get(from) !== to) {
        this.addError('move-table:transfers', `${move} sends ${from} to ${to}, cycles say ${expected.get(from)}`, {
          move,
          address: addressKey(ALL_ADDRESSES[from]),
        });
      }
    }
    if (expected.size !== table.transfers.length) {
      this.addError('move-table:transfers', `${move} has ${table.transfers.length} transfers for ${expected.size} cycle entries`, {
        move,
      });
    }
  }

  private validateOrderFour(table: MoveTable): void {
    this.markRuleChecked('move-table:order-four');
    let labels = identity();
    for (let i = 0; i < 4; i++) {
      labels = permute(labels, table);
    }
    if (!isIdentity(labels)) {
      this.addError('move-table:order-four', `${label(table.move)} applied four times is not the identity`, {
        move: label(table.move),
      });
    }
  }

  private validateInverses(): void {
    this.markRuleChecked('move-table:inverse');
    for (const face of ALL_FACES) {
      const cw = this.findTable(face, 'cw');
      const ccw = this.findTable(face, 'ccw');
      if (!cw || !ccw) continue;
      if (!isIdentity(permute(permute(identity(), cw), ccw)) || !isIdentity(permute(permute(identity(), ccw), cw))) {
        this.addError('move-table:inverse', `${face} clockwise and counter-clockwise are not inverses`, {
          move: face,
        });
      }
    }
  }

  private validateCoverage(): void {
    this.markRuleChecked('move-table:coverage');
    const reached = new Set<number>();
    for (const table of this.tables) {
      for (const address of table.workingSet) {
        reached.add(addressIndex(address));
      }
    }
    for (const address of ALL_ADDRESSES) {
      if (!reached.has(addressIndex(address))) {
        this.addError('move-table:coverage', `No move touches ${addressKey(address)}`, {
          address: addressKey(address),
        });
      }
    }
  }

  private validateOppositesDisjoint(): void {
    this.markRuleChecked('move-table:opposites-disjoint');
    for (const face of ALL_FACES) {
      const opposite = OPPOSITE_FACE[face];
      const a = this.findTable(face, 'cw');
      const b = this.findTable(opposite, 'cw');
      if (!a || !b) continue;
      const keys = new Set(a.workingSet.map(addressKey));
      const shared = b.workingSet.map(addressKey).filter((key) => keys.has(key));
      if (shared.length > 0) {
        this.addError('move-table:opposites-disjoint', `${face} and ${opposite} share ${shared.join(', ')}`, {
          move: face,
          shared,
        });
      }
    }
  }

  private validateGeometry(table: MoveTable): void {
    this.markRuleChecked('move-table:geometry');
    const move = label(table.move);
    const rotation = getTurnRotation(table.move);
    const destinations = new Map(table.transfers);

    for (const address of ALL_ADDRESSES) {
      const index = addressIndex(address);
      const inLayer = isInTurnLayer(address, table.move.face);
      const listed = destinations.get(index);

      if (!inLayer) {
        if (listed !== undefined) {
          this.addError('move-table:geometry', `${move} moves ${addressKey(address)}, which is outside the turning layer`, {
            move,
            address: addressKey(address),
          });
        }
        continue;
      }

      const turned = rotatePlacement(getStickerPlacement(address), rotation);
      const target = findAddressAt(turned.position, turned.normal);
      if (!target || listed !== addressIndex(target)) {
        this.addError('move-table:geometry', `${move} sends ${addressKey(address)} to the wrong place`, {
          move,
          address: addressKey(address),
          expected: target ? addressKey(target) : null,
          actual: listed === undefined ? null : addressKey(ALL_ADDRESSES[listed]),
        });
      }
    }
  }
}

// =============================================================================
// Convenience
// =============================================================================

export function checkMoveTables(tables: readonly MoveTable[]): MoveTableCheckResult {
  return new MoveTableChecker(tables).validateAll();
}

/** Throws MoveTableError listing every failure */
export function assertValidMoveTables(tables: readonly MoveTable[]): void {
  const result = checkMoveTables(tables);
  if (!result.valid) {
    throw new MoveTableError(result.errors.map((e) => `[${e.rule}] ${e.message}`));
  }
}

export function formatMoveTableCheckResult(result: MoveTableCheckResult): string {
  const lines = [
    `Move tables: ${result.valid ? 'valid' : 'INVALID'} (${result.summary.tableCount} tables, ${result.summary.rulesChecked.length} rules)`,
  ];
  for (const error of result.errors) {
    lines.push(`  ✗ [${error.rule}] ${error.message}`);
  }
  return lines.join('\n');
}
