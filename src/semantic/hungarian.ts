import { InputError } from '../errors';
import type { AssignmentResult } from './types';

/**
 * Kuhn–Munkres (Hungarian) solver for the rectangular assignment problem.
 *
 * Rows are matched to distinct columns so that the summed cost is minimal.
 * Each row is added through a shortest augmenting path while row and
 * column potentials keep every reduced cost non-negative, O(n²·m) overall.
 *
 * With more rows than columns the matrix is solved transposed and the
 * surplus rows come back as -1.
 */
export function solveAssignment(costMatrix: readonly (readonly number[])[]): AssignmentResult {
  const rows = costMatrix.length;
  if (rows === 0) {
    return { assignment: [], totalCost: 0 };
  }

  const cols = costMatrix[0].length;
  for (let i = 0; i < rows; i++) {
    const row = costMatrix[i];
    if (row.length !== cols) {
      throw new InputError(`Cost matrix is ragged: row ${i} has ${row.length} entries, expected ${cols}`);
    }
    for (let j = 0; j < cols; j++) {
      if (!Number.isFinite(row[j])) {
        throw new InputError(`Cost matrix entry [${i}][${j}] is not a finite number`);
      }
    }
  }

  if (cols === 0) {
    return { assignment: new Array<number>(rows).fill(-1), totalCost: 0 };
  }

  let assignment: number[];
  if (rows <= cols) {
    assignment = solveWide((i, j) => costMatrix[i][j], rows, cols);
  } else {
    const byColumn = solveWide((i, j) => costMatrix[j][i], cols, rows);
    assignment = new Array<number>(rows).fill(-1);
    byColumn.forEach((row, col) => {
      assignment[row] = col;
    });
  }

  let totalCost = 0;
  assignment.forEach((col, row) => {
    if (col !== -1) {
      totalCost += costMatrix[row][col];
    }
  });

  return { assignment, totalCost };
}

/**
 * Core solver for n <= m. Index 0 of the potential and matching arrays is a
 * virtual column used as the root of every augmenting search.
 */
function solveWide(cost: (row: number, col: number) => number, n: number, m: number): number[] {
  const u = new Float64Array(n + 1);
  const v = new Float64Array(m + 1);
  // rowOf[j]: 1-based row matched to column j, 0 when free
  const rowOf = new Int32Array(m + 1);
  const way = new Int32Array(m + 1);

  for (let i = 1; i <= n; i++) {
    rowOf[0] = i;
    let j0 = 0;
    const minv = new Float64Array(m + 1).fill(Infinity);
    const used = new Uint8Array(m + 1);

    do {
      used[j0] = 1;
      const i0 = rowOf[j0];
      let delta = Infinity;
      let j1 = 0;

      for (let j = 1; j <= m; j++) {
        if (used[j]) continue;
        const reduced = cost(i0 - 1, j - 1) - u[i0] - v[j];
        if (reduced < minv[j]) {
          minv[j] = reduced;
          way[j] = j0;
        }
        if (minv[j] < delta) {
          delta = minv[j];
          j1 = j;
        }
      }

      for (let j = 0; j <= m; j++) {
        if (used[j]) {
          u[rowOf[j]] += delta;
          v[j] -= delta;
        } else {
          minv[j] -= delta;
        }
      }

      j0 = j1;
    } while (rowOf[j0] !== 0);

    // flip the augmenting path back to the root
    do {
      const j1 = way[j0];
      rowOf[j0] = rowOf[j1];
      j0 = j1;
    } while (j0 !== 0);
  }

  const assignment = new Array<number>(n).fill(-1);
  for (let j = 1; j <= m; j++) {
    if (rowOf[j] !== 0) {
      assignment[rowOf[j] - 1] = j - 1;
    }
  }
  return assignment;
}
