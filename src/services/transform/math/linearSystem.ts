import { PIVOT_EPSILON } from '@/constants/transform';

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 *
 * Returns null instead of throwing when the system is singular: a pivot smaller than
 * `pivotEpsilon` times the largest |A[i][j]|, or a non-finite component in the solution.
 * Neither input is modified.
 */
export function solveLinearSystem(
    matrix: readonly (readonly number[])[],
    rhs: readonly number[],
    pivotEpsilon: number = PIVOT_EPSILON,
): number[] | null {
    const n = rhs.length;
    if (n === 0 || matrix.length !== n || matrix.some((row) => row.length !== n)) {
        return null;
    }

    let scale = 0;
    for (const row of matrix) {
        for (const value of row) {
            if (!Number.isFinite(value)) {
                return null;
            }
            scale = Math.max(scale, Math.abs(value));
        }
    }
    if (scale === 0) {
        return null;
    }
    const threshold = pivotEpsilon * scale;

    const aug = matrix.map((row, i) => [...row, rhs[i]]);

    for (let col = 0; col < n; col += 1) {
        let maxRow = col;
        let maxVal = Math.abs(aug[col][col]);
        for (let row = col + 1; row < n; row += 1) {
            const val = Math.abs(aug[row][col]);
            if (val > maxVal) {
                maxVal = val;
                maxRow = row;
            }
        }

        if (maxVal < threshold) {
            return null;
        }

        if (maxRow !== col) {
            const tmp = aug[col];
            aug[col] = aug[maxRow];
            aug[maxRow] = tmp;
        }

        const pivotRow = aug[col];
        for (let row = col + 1; row < n; row += 1) {
            const target = aug[row];
            const factor = target[col] / pivotRow[col];
            if (factor === 0) {
                continue;
            }
            for (let j = col; j <= n; j += 1) {
                target[j] -= factor * pivotRow[j];
            }
        }
    }

    const x = new Array<number>(n).fill(0);
    for (let i = n - 1; i >= 0; i -= 1) {
        let sum = aug[i][n];
        for (let j = i + 1; j < n; j += 1) {
            sum -= aug[i][j] * x[j];
        }
        x[i] = sum / aug[i][i];
        if (!Number.isFinite(x[i])) {
            return null;
        }
    }
    return x;
}
