/**
 * Dense vector helpers shared by the batcher, the snapshot and the service
 */

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function l2Norm(vector: ArrayLike<number>): number {
  return Math.sqrt(dot(vector, vector));
}

/**
 * Unit-length float32 copy of a vector, or null when the vector has no
 * direction (zero norm, NaN or infinite components).
 */
export function normalize(vector: ArrayLike<number>): Float32Array | null {
  const norm = l2Norm(vector);
  if (!Number.isFinite(norm) || norm === 0) {
    return null;
  }

  const out = new Float32Array(vector.length);
  for (let i = 0; i < vector.length; i++) {
    out[i] = vector[i] / norm;
  }
  return out;
}
