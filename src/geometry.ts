/** A 2D point as exchanged with callers: `[x, y]`, origin top-left, y down. */
export type Point = readonly [number, number];

const DEG = Math.PI / 180;
const MAX_ARC_SEGMENTS = 4096;

/**
 * Vertices of a regular polygon inscribed in a circle. With `rotation` 0 the
 * first vertex points straight up.
 */
export function regularPolygonVertices(
  sides: number,
  cx: number,
  cy: number,
  radius: number,
  rotation = 0,
): Point[] {
  const n = Math.floor(sides);
  if (!(n >= 3)) return [];
  const start = (rotation - 90) * DEG;
  const points: Point[] = [];
  for (let i = 0; i < n; i++) {
    const angle = start + (2 * Math.PI * i) / n;
    points.push([cx + radius * Math.cos(angle), cy + radius * Math.sin(angle)]);
  }
  return points;
}

/**
 * Vertices alternating between an outer and inner radius, first one pointing up.
 * Stars and gear teeth are built from this.
 */
export function alternatingVertices(
  spikes: number,
  cx: number,
  cy: number,
  outerRadius: number,
  innerRadius: number,
): Point[] {
  const n = Math.floor(spikes);
  if (!(n >= 2)) return [];
  const points: Point[] = [];
  for (let i = 0; i < n * 2; i++) {
    const angle = (Math.PI * i) / n - Math.PI / 2;
    const r = i % 2 === 0 ? outerRadius : innerRadius;
    points.push([cx + r * Math.cos(angle), cy + r * Math.sin(angle)]);
  }
  return points;
}

export function binomial(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  if (k === 0 || k === n) return 1;
  let result = 1;
  for (let i = 0; i < Math.min(k, n - k); i++) {
    result = (result * (n - i)) / (i + 1);
  }
  return Math.round(result);
}

/** B(t) = Σ C(n,i) (1-t)^(n-i) t^i · P_i */
export function bezierPoint(controls: readonly Point[], t: number): Point {
  const n = controls.length - 1;
  let x = 0;
  let y = 0;
  controls.forEach(([px, py], i) => {
    const coef = binomial(n, i) * (1 - t) ** (n - i) * t ** i;
    x += coef * px;
    y += coef * py;
  });
  return [x, y];
}

/** `steps + 1` evenly spaced samples over t ∈ [0, 1]. */
export function sampleBezier(controls: readonly Point[], steps = 50): Point[] {
  if (controls.length < 2) return [];
  const n = Math.max(1, Math.floor(steps));
  const samples: Point[] = [];
  for (let i = 0; i <= n; i++) {
    samples.push(bezierPoint(controls, i / n));
  }
  return samples;
}

/**
 * Points along an elliptical arc. 0° is the +x axis and angles grow clockwise
 * on screen. An end angle below the start wraps to the equivalent angle within
 * one turn; sweeps beyond a full turn are clamped to 360°. At most 4096 segments.
 */
export function arcPoints(
  cx: number,
  cy: number,
  rx: number,
  ry: number,
  startDeg: number,
  endDeg: number,
): Point[] {
  const diff = endDeg - startDeg;
  const sweep = diff < 0 ? ((diff % 360) + 360) % 360 : Math.min(diff, 360);
  const segments = Math.min(
    MAX_ARC_SEGMENTS,
    Math.max(2, Math.ceil((sweep / 360) * Math.max(16, (Math.abs(rx) + Math.abs(ry)) * 2))),
  );
  const points: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    const a = (startDeg + (sweep * i) / segments) * DEG;
    points.push([cx + rx * Math.cos(a), cy + ry * Math.sin(a)]);
  }
  return points;
}

/** Parametric heart outline sampled every 5°, scaled so `size` is roughly its half-width. */
export function heartPoints(cx: number, cy: number, size: number): Point[] {
  const points: Point[] = [];
  for (let t = 0; t < 360; t += 5) {
    const rad = t * DEG;
    const x = 16 * Math.sin(rad) ** 3;
    const y = 13 * Math.cos(rad) - 5 * Math.cos(2 * rad) - 2 * Math.cos(3 * rad) - Math.cos(4 * rad);
    points.push([cx + (x * size) / 18, cy - (y * size) / 18]);
  }
  return points;
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

export function isFinitePoint(p: Point): boolean {
  return Number.isFinite(p[0]) && Number.isFinite(p[1]);
}
