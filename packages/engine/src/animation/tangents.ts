import type { AnimCurve, TangentRepr, TangentSide } from "./types.js";

/**
 * Local tangent component carried by a stored tangent: the value extent for
 * weighted tangents, `tan(angle) * weight` for angle tangents.
 */
export function tangentComponent(tangent: TangentRepr): number {
  if (tangent.kind === "weighted") {
    return tangent.y;
  }
  return Math.tan(tangent.angle) * tangent.weight;
}

export function readTangentComponent(curve: AnimCurve, index: number, side: TangentSide): number {
  if (index < 0 || index >= curve.numKeys()) return 0;
  return tangentComponent(curve.getTangent(index, side));
}

/**
 * Inverse of `tangentComponent`, keeping the stored time extent (weighted)
 * or weight (angle). The in side is negated: handles are drawn backwards
 * from the key while the curve stores both sides pointing forward in time.
 */
export function tangentFromComponent(current: TangentRepr, value: number, side: TangentSide): TangentRepr {
  const signed = side === "in" ? -value : value;
  if (current.kind === "weighted") {
    return { kind: "weighted", x: current.x, y: signed };
  }
  const weight = current.weight === 0 ? 1 : current.weight;
  return { kind: "angle", angle: Math.atan(signed / weight), weight };
}
