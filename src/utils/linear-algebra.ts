export type Matrix = number[][];

export function transpose(matrix: Matrix): Matrix {
  const rows = matrix.length;
  const cols = matrix[0]?.length ?? 0;
  const result: Matrix = [];
  for (let j = 0; j < cols; j++) {
    const row: number[] = [];
    for (let i = 0; i < rows; i++) row.push(matrix[i]![j]!);
    result.push(row);
  }
  return result;
}

export function multiply(a: Matrix, b: Matrix): Matrix {
  const inner = b.length;
  const cols = b[0]?.length ?? 0;
  return a.map(row => {
    if (row.length !== inner) {
      throw new RangeError(`Dimension mismatch: ${row.length} vs ${inner}`);
    }
    const out = new Array<number>(cols).fill(0);
    for (let k = 0; k < inner; k++) {
      const aik = row[k]!;
      if (aik === 0) continue;
      const bRow = b[k]!;
      for (let j = 0; j < cols; j++) out[j]! += aik * bRow[j]!;
    }
    return out;
  });
}

export function multiplyVector(matrix: Matrix, vector: readonly number[]): number[] {
  return matrix.map(row => row.reduce((sum, value, j) => sum + value * (vector[j] ?? 0), 0));
}

function identity(n: number): Matrix {
  return Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)));
}

export interface SymmetricEigenResult {
  values: number[]; // ascending
  vectors: number[][]; // vectors[i] belongs to values[i]
  sweeps: number;
}

/**
 * Cyclic Jacobi eigen-decomposition of a real symmetric matrix.
 * Each sweep zeroes every off-diagonal pair once; stops when the
 * off-diagonal mass vanishes or after `maxSweeps`.
 */
export function symmetricEigen(input: Matrix, maxSweeps = 100): SymmetricEigenResult {
  const n = input.length;
  const a = input.map(row => [...row]);
  const v = identity(n);

  let sweeps = 0;
  for (; sweeps < maxSweeps; sweeps++) {
    let offDiagonal = 0;
    for (let p = 0; p < n; p++) {
      for (let q = p + 1; q < n; q++) offDiagonal += a[p]![q]! ** 2;
    }
    if (offDiagonal < 1e-30) break;

    for (let p = 0; p < n - 1; p++) {
      for (let q = p + 1; q < n; q++) {
        const apq = a[p]![q]!;
        if (Math.abs(apq) < 1e-300) continue;
        rotate(a, v, p, q);
      }
    }
  }

  const order = Array.from({ length: n }, (_, i) => i).sort((i, j) => a[i]![i]! - a[j]![j]!);
  return {
    values: order.map(i => a[i]![i]!),
    vectors: order.map(i => v.map(row => row[i]!)),
    sweeps,
  };
}

function rotate(a: Matrix, v: Matrix, p: number, q: number): void {
  const n = a.length;
  const apq = a[p]![q]!;
  const theta = (a[q]![q]! - a[p]![p]!) / (2 * apq);
  const t = (theta >= 0 ? 1 : -1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
  const c = 1 / Math.sqrt(1 + t * t);
  const s = t * c;

  for (let k = 0; k < n; k++) {
    const akp = a[k]![p]!;
    const akq = a[k]![q]!;
    a[k]![p] = c * akp - s * akq;
    a[k]![q] = s * akp + c * akq;
  }
  for (let k = 0; k < n; k++) {
    const apk = a[p]![k]!;
    const aqk = a[q]![k]!;
    a[p]![k] = c * apk - s * aqk;
    a[q]![k] = s * apk + c * aqk;
  }
  for (let k = 0; k < n; k++) {
    const vkp = v[k]![p]!;
    const vkq = v[k]![q]!;
    v[k]![p] = c * vkp - s * vkq;
    v[k]![q] = s * vkp + c * vkq;
  }
}

export interface NullVectorResult {
  vector: number[];
  singularValues: number[]; // ascending
  nullity: number;
}

/**
 * Right singular vector of the smallest singular value of `matrix`.
 * Eigenvectors of MᵀM are the right singular vectors, with σ = √λ.
 */
export function smallestRightSingularVector(matrix: Matrix, maxSweeps = 100): NullVectorResult {
  const gram = multiply(transpose(matrix), matrix);
  const { values, vectors } = symmetricEigen(gram, maxSweeps);
  const largest = Math.max(1, ...values.map(Math.abs));
  const nullity = values.filter(value => value <= 1e-9 * largest).length;
  const vector = vectors[0];
  if (!vector) {
    throw new RangeError('Matrix has no columns');
  }
  return {
    vector: [...vector],
    singularValues: values.map(value => Math.sqrt(Math.max(0, value))),
    nullity,
  };
}
