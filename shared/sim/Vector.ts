import Matter from "matter-js";
import type { Vec2 } from "./types.js";

const { Vector } = Matter;

// Thin layer over Matter.Vector so entity code stays in plain {x, y} records.

export function add(a: Vec2, b: Vec2): Vec2 {
  const out = Vector.add(a, b);
  return { x: out.x, y: out.y };
}

export function scale(v: Vec2, s: number): Vec2 {
  const out = Vector.mult(v, s);
  return { x: out.x, y: out.y };
}

export function lengthSquared(v: Vec2): number {
  return Vector.magnitudeSquared(v);
}

function floorMod(value: number, size: number): number {
  return ((value % size) + size) % size;
}

/** Toroidal wrap, each axis into [0, size). */
export function wrap(position: Vec2, width: number, height: number): Vec2 {
  return {
    x: floorMod(position.x, width),
    y: floorMod(position.y, height),
  };
}

export function directionFromAngle(angleRadians: number): Vec2 {
  return { x: Math.cos(angleRadians), y: Math.sin(angleRadians) };
}

/** 90° counterclockwise: (-y, x). */
export function perpendicular(v: Vec2): Vec2 {
  const out = Vector.perp(v);
  return { x: out.x, y: out.y };
}

// Raw Euclidean distance; does not look across the wrap seam.
export function circlesOverlap(
  centerA: Vec2,
  radiusA: number,
  centerB: Vec2,
  radiusB: number,
): boolean {
  const reach = radiusA + radiusB;
  return Vector.magnitudeSquared(Vector.sub(centerA, centerB)) < reach * reach;
}
