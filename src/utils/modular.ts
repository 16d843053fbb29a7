/** Euclidean modulo — always in [0, n), also for negative a. */
export function mod(a: number, n: number): number {
  return ((a % n) + n) % n
}

/** floor(log2(x)) for a positive integer x, computed without Math.log. */
export function floorLog2(x: number): number {
  let exp = 0
  let v = x
  while (v >= 2) {
    v = Math.floor(v / 2)
    exp++
  }
  return exp
}
