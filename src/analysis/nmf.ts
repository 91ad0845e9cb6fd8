import { SeededRandom } from './random.js';
import { FactorizationError } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/** Guards the multiplicative updates against division by zero */
const EPSILON = 1e-10;

/** Convergence is checked every this many iterations */
const CHECK_INTERVAL = 10;

export interface NmfOptions {
    components: number;
    maxIterations: number;
    seed: number;
    tolerance: number;
}

export interface NmfResult {
    /** Document × component weights */
    W: number[][];
    /** Component × term weights */
    H: number[][];
    iterations: number;
    /** Frobenius norm of X − WH at exit */
    reconstructionError: number;
}

/**
 * Non-negative matrix factorization X ≈ W·H with Lee–Seung multiplicative
 * updates on the Frobenius loss.
 *
 * Both factors start from |N(0, 1)| · sqrt(mean(X) / k) drawn from a seeded
 * generator, so a given input and seed always yield the same factors.
 * Stops after `maxIterations`, or earlier once the error improvement since
 * the last check, relative to the initial error, falls below `tolerance`.
 *
 * @throws FactorizationError on an empty, negative, all-zero or non-finite
 *   input, or when the updates diverge
 */
export function factorize(X: readonly (readonly number[])[], options: NmfOptions): NmfResult {
    const n = X.length;
    const m = X[0]?.length ?? 0;
    const k = options.components;

    if (k < 1) throw new FactorizationError(`Component count must be positive, got ${k}`);
    if (n === 0 || m === 0) throw new FactorizationError('Cannot factorize an empty matrix');

    let sum = 0;
    for (const row of X) {
        if (row.length !== m) throw new FactorizationError('Matrix rows differ in length');
        for (const value of row) {
            if (!Number.isFinite(value)) throw new FactorizationError('Matrix contains a non-finite value');
            if (value < 0) throw new FactorizationError('Matrix contains a negative value');
            sum += value;
        }
    }
    if (sum === 0) throw new FactorizationError('Matrix is all zeros');

    const random = new SeededRandom(options.seed);
    const scale = Math.sqrt(sum / (n * m) / k);
    const H = fill(k, m, () => scale * Math.abs(random.normal()));
    const W = fill(n, k, () => scale * Math.abs(random.normal()));

    const initialError = frobeniusError(X, W, H);
    let previousError = initialError;
    let iterations = 0;

    for (let iter = 1; iter <= options.maxIterations; iter++) {
        updateH(X, W, H);
        updateW(X, W, H);
        iterations = iter;

        if (iter % CHECK_INTERVAL === 0) {
            const error = frobeniusError(X, W, H);
            if (!Number.isFinite(error)) throw new FactorizationError('Factorization diverged');

            if (initialError === 0 || (previousError - error) / initialError < options.tolerance) {
                getLogger().debug({ iterations: iter, error }, 'NMF converged');
                break;
            }
            previousError = error;
        }
    }

    const reconstructionError = frobeniusError(X, W, H);
    if (!Number.isFinite(reconstructionError)) throw new FactorizationError('Factorization diverged');

    if (iterations === options.maxIterations) {
        getLogger().debug({ iterations, reconstructionError }, 'NMF stopped at iteration cap');
    }

    return { W, H, iterations, reconstructionError };
}

// ─── Internal helpers ─────────────────────────────────

function fill(rows: number, cols: number, value: () => number): number[][] {
    const matrix: number[][] = [];
    for (let i = 0; i < rows; i++) {
        const row = new Array<number>(cols);
        for (let j = 0; j < cols; j++) row[j] = value();
        matrix.push(row);
    }
    return matrix;
}

function multiply(A: readonly (readonly number[])[], B: readonly (readonly number[])[]): number[][] {
    const rows = A.length;
    const inner = B.length;
    const cols = B[0]?.length ?? 0;
    const out = fill(rows, cols, () => 0);

    for (let i = 0; i < rows; i++) {
        const a = A[i] ?? [];
        const o = out[i] ?? [];
        for (let p = 0; p < inner; p++) {
            const aip = a[p] ?? 0;
            if (aip === 0) continue;
            const b = B[p] ?? [];
            for (let j = 0; j < cols; j++) o[j] = (o[j] ?? 0) + aip * (b[j] ?? 0);
        }
    }

    return out;
}

function transpose(A: readonly (readonly number[])[]): number[][] {
    const rows = A.length;
    const cols = A[0]?.length ?? 0;
    const out = fill(cols, rows, () => 0);
    for (let i = 0; i < rows; i++) {
        const a = A[i] ?? [];
        for (let j = 0; j < cols; j++) {
            const o = out[j];
            if (o) o[i] = a[j] ?? 0;
        }
    }
    return out;
}

/** H ← H ⊙ (WᵀX) / (WᵀW·H) */
function updateH(X: readonly (readonly number[])[], W: number[][], H: number[][]): void {
    const Wt = transpose(W);
    const numerator = multiply(Wt, X);
    const denominator = multiply(multiply(Wt, W), H);
    scaleInPlace(H, numerator, denominator);
}

/** W ← W ⊙ (XHᵀ) / (W·HHᵀ) */
function updateW(X: readonly (readonly number[])[], W: number[][], H: number[][]): void {
    const Ht = transpose(H);
    const numerator = multiply(X, Ht);
    const denominator = multiply(W, multiply(H, Ht));
    scaleInPlace(W, numerator, denominator);
}

function scaleInPlace(target: number[][], numerator: number[][], denominator: number[][]): void {
    for (let i = 0; i < target.length; i++) {
        const row = target[i] ?? [];
        const num = numerator[i] ?? [];
        const den = denominator[i] ?? [];
        for (let j = 0; j < row.length; j++) {
            row[j] = (row[j] ?? 0) * ((num[j] ?? 0) / ((den[j] ?? 0) + EPSILON));
        }
    }
}

function frobeniusError(
    X: readonly (readonly number[])[],
    W: readonly (readonly number[])[],
    H: readonly (readonly number[])[]
): number {
    const product = multiply(W, H);
    let total = 0;
    for (let i = 0; i < X.length; i++) {
        const x = X[i] ?? [];
        const p = product[i] ?? [];
        for (let j = 0; j < x.length; j++) {
            const diff = (x[j] ?? 0) - (p[j] ?? 0);
            total += diff * diff;
        }
    }
    return Math.sqrt(total);
}
