import { describe, it, expect } from "vitest";
import { add, circlesOverlap, directionFromAngle, perpendicular, scale, wrap } from "./Vector.js";

describe("wrap", () => {
  it("reduces negative and overflowing coordinates into the field", () => {
    expect(wrap({ x: -10, y: 650 }, 960, 640)).toEqual({ x: 950, y: 10 });
  });

  it("handles positions several fields away", () => {
    expect(wrap({ x: 960 * 3 + 5, y: -640 * 2 - 1 }, 960, 640)).toEqual({ x: 5, y: 639 });
  });

  it("maps the far edge back to zero", () => {
    expect(wrap({ x: 960, y: 640 }, 960, 640)).toEqual({ x: 0, y: 0 });
  });

  it("leaves in-field positions alone", () => {
    expect(wrap({ x: 12.5, y: 600 }, 960, 640)).toEqual({ x: 12.5, y: 600 });
  });
});

describe("directionFromAngle", () => {
  it("returns cos/sin of the angle", () => {
    expect(directionFromAngle(0)).toEqual({ x: 1, y: 0 });
    const down = directionFromAngle(Math.PI / 2);
    expect(down.x).toBeCloseTo(0);
    expect(down.y).toBeCloseTo(1);
  });
});

describe("perpendicular", () => {
  it("rotates a quarter turn counterclockwise", () => {
    expect(perpendicular({ x: 3, y: 4 })).toEqual({ x: -4, y: 3 });
    expect(perpendicular({ x: 2, y: 1 })).toEqual({ x: -1, y: 2 });
  });
});

describe("add / scale", () => {
  it("combine component-wise", () => {
    expect(add({ x: 1, y: 2 }, { x: 3, y: -5 })).toEqual({ x: 4, y: -3 });
    expect(scale({ x: 3, y: -2 }, 2)).toEqual({ x: 6, y: -4 });
  });
});

describe("circlesOverlap", () => {
  it("is strict: touching circles do not overlap", () => {
    expect(circlesOverlap({ x: 0, y: 0 }, 3, { x: 5, y: 0 }, 2)).toBe(false);
  });

  it("detects overlapping circles", () => {
    expect(circlesOverlap({ x: 0, y: 0 }, 3, { x: 4.9, y: 0 }, 2)).toBe(true);
    expect(circlesOverlap({ x: 10, y: 10 }, 1, { x: 10, y: 10 }, 1)).toBe(true);
  });

  it("does not look across the wrap seam", () => {
    expect(circlesOverlap({ x: 1, y: 320 }, 5, { x: 959, y: 320 }, 5)).toBe(false);
  });
});
