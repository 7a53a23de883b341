import * as THREE from "three";
import type { Color, Vec2, Vec3 } from "@keytrail/engine";

export type RenderCapability = "immediate" | "batched";

export interface RenderStyle {
  color: Color;
  /** Line width or point size in pixels, label size for text. A circle of size 0 is filled. */
  size: number;
}

/**
 * Drawing collaborator. Immediate sinks draw as calls arrive; batched sinks
 * queue primitives until flushed. Callers never branch on the capability.
 */
export interface RenderSink {
  readonly capability: RenderCapability;
  line(points: Vec3[], style: RenderStyle): void;
  point(position: Vec3, style: RenderStyle): void;
  label(position: Vec3, text: string, style: RenderStyle): void;
  /** Round marker split into equal slices, one per color, clockwise from the top. */
  marker(position: Vec3, slices: Color[], size: number): void;
  screenLine(points: Vec2[], style: RenderStyle): void;
  screenCircle(center: Vec2, radius: number, style: RenderStyle): void;
}

export type DrawItem =
  | { kind: "line"; points: Vec3[]; style: RenderStyle }
  | { kind: "point"; position: Vec3; style: RenderStyle }
  | { kind: "label"; position: Vec3; text: string; style: RenderStyle }
  | { kind: "marker"; position: Vec3; slices: Color[]; size: number }
  | { kind: "screenLine"; points: Vec2[]; style: RenderStyle }
  | { kind: "screenCircle"; center: Vec2; radius: number; style: RenderStyle };

/** Batched sink: queues primitives for a renderer that draws once per frame. */
export class DrawListSink implements RenderSink {
  readonly capability = "batched" as const;
  private items: DrawItem[] = [];

  line(points: Vec3[], style: RenderStyle): void {
    this.items.push({ kind: "line", points: points.map((p) => ({ ...p })), style });
  }

  point(position: Vec3, style: RenderStyle): void {
    this.items.push({ kind: "point", position: { ...position }, style });
  }

  label(position: Vec3, text: string, style: RenderStyle): void {
    this.items.push({ kind: "label", position: { ...position }, text, style });
  }

  marker(position: Vec3, slices: Color[], size: number): void {
    this.items.push({ kind: "marker", position: { ...position }, slices: slices.map((c) => ({ ...c })), size });
  }

  screenLine(points: Vec2[], style: RenderStyle): void {
    this.items.push({ kind: "screenLine", points: points.map((p) => ({ ...p })), style });
  }

  screenCircle(center: Vec2, radius: number, style: RenderStyle): void {
    this.items.push({ kind: "screenCircle", center: { ...center }, radius, style });
  }

  get pending(): number {
    return this.items.length;
  }

  flush(): DrawItem[] {
    const items = this.items;
    this.items = [];
    return items;
  }
}

function toThreeColor(color: Color): THREE.Color {
  return new THREE.Color(color.r, color.g, color.b);
}

function disposeObject(object: THREE.Object3D): void {
  if (!(object instanceof THREE.Line || object instanceof THREE.Points)) return;
  object.geometry.dispose();
  const material = object.material;
  if (Array.isArray(material)) {
    material.forEach((entry) => entry.dispose());
  } else {
    material.dispose();
  }
}

/**
 * Immediate sink: every call adds a three.js object under `group`. Screen
 * space primitives have no scene counterpart and go to `overlay` for a 2D
 * layer drawn on top.
 */
export class SceneSink implements RenderSink {
  readonly capability = "immediate" as const;
  readonly group: THREE.Group;
  readonly overlay: DrawItem[] = [];

  constructor(group: THREE.Group = new THREE.Group()) {
    this.group = group;
  }

  line(points: Vec3[], style: RenderStyle): void {
    const geometry = new THREE.BufferGeometry().setFromPoints(points.map((p) => new THREE.Vector3(p.x, p.y, p.z)));
    const material = new THREE.LineBasicMaterial({
      color: toThreeColor(style.color),
      linewidth: style.size,
      transparent: style.color.a < 1,
      opacity: style.color.a,
    });
    this.group.add(new THREE.Line(geometry, material));
  }

  point(position: Vec3, style: RenderStyle): void {
    const geometry = new THREE.BufferGeometry().setFromPoints([new THREE.Vector3(position.x, position.y, position.z)]);
    const material = new THREE.PointsMaterial({
      color: toThreeColor(style.color),
      size: style.size,
      sizeAttenuation: false,
      transparent: style.color.a < 1,
      opacity: style.color.a,
    });
    this.group.add(new THREE.Points(geometry, material));
  }

  label(position: Vec3, text: string, style: RenderStyle): void {
    const anchor = new THREE.Object3D();
    anchor.name = text;
    anchor.position.set(position.x, position.y, position.z);
    anchor.userData = { label: text, style };
    this.group.add(anchor);
  }

  /** Slices become one point each, tagged with their index for a shader to cut. */
  marker(position: Vec3, slices: Color[], size: number): void {
    const marker = new THREE.Group();
    marker.position.set(position.x, position.y, position.z);
    slices.forEach((slice, index) => {
      const geometry = new THREE.BufferGeometry().setFromPoints([new THREE.Vector3()]);
      const points = new THREE.Points(
        geometry,
        new THREE.PointsMaterial({ color: toThreeColor(slice), size, sizeAttenuation: false }),
      );
      points.userData = { slice: index, slices: slices.length };
      marker.add(points);
    });
    this.group.add(marker);
  }

  screenLine(points: Vec2[], style: RenderStyle): void {
    this.overlay.push({ kind: "screenLine", points: points.map((p) => ({ ...p })), style });
  }

  screenCircle(center: Vec2, radius: number, style: RenderStyle): void {
    this.overlay.push({ kind: "screenCircle", center: { ...center }, radius, style });
  }

  clear(): void {
    for (const child of [...this.group.children]) {
      child.traverse(disposeObject);
      this.group.remove(child);
    }
    this.overlay.length = 0;
  }
}
