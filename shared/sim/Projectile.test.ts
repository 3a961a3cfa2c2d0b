import { describe, it, expect } from "vitest";
import { Projectile } from "./Projectile.js";
import { resolveSimConfig } from "./utils.js";

const cfg = resolveSimConfig();

describe("Projectile", () => {
  it("moves by velocity times dt", () => {
    const proj = new Projectile(cfg, { x: 100, y: 100 }, { x: 50, y: -20 });
    proj.update(0.1);
    expect(proj.position.x).toBeCloseTo(105);
    expect(proj.position.y).toBeCloseTo(98);
    expect(proj.age).toBeCloseTo(0.1);
    expect(proj.alive).toBe(true);
  });

  it("wraps across field edges", () => {
    const proj = new Projectile(cfg, { x: 950, y: 5 }, { x: 200, y: -100 });
    proj.update(0.1);
    expect(proj.position.x).toBeCloseTo(10);
    expect(proj.position.y).toBeCloseTo(635);
  });

  it("lives out its lifetime and then expires without moving", () => {
    const proj = new Projectile(cfg, { x: 100, y: 100 }, { x: 10, y: 0 });
    for (let i = 0; i < 11; i++) {
      proj.update(0.1);
    }
    expect(proj.alive).toBe(true);

    const before = { ...proj.position };
    proj.update(0.15);
    expect(proj.alive).toBe(false);
    expect(proj.position).toEqual(before);
  });

  it("expires on a single oversized step", () => {
    const proj = new Projectile(cfg, { x: 0, y: 0 }, { x: 0, y: 0 });
    proj.update(5);
    expect(proj.alive).toBe(false);
  });

  it("copies the vectors it is given", () => {
    const start = { x: 1, y: 2 };
    const proj = new Projectile(cfg, start, { x: 10, y: 10 });
    proj.update(0.5);
    expect(start).toEqual({ x: 1, y: 2 });
    expect(proj.getState()).toEqual({ x: 6, y: 7, age: 0.5 });
  });
});
