import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { findPath, isPathClear, manhattan, neighbours } from "../src/pathfinding/aStar.js";

describe("pathfinding A*", () => {
  it("returns the start alone when start and goal coincide", () => {
    expect(findPath({ x: 2, y: 3 }, { x: 2, y: 3 }, 5, 5)).to.deep.equal([{ x: 2, y: 3 }]);
  });

  it("walks straight along an open row", () => {
    expect(findPath({ x: 0, y: 0 }, { x: 2, y: 0 }, 3, 3)).to.deep.equal([
      { x: 0, y: 0 },
      { x: 1, y: 0 },
      { x: 2, y: 0 },
    ]);
  });

  it("routes around a wall", () => {
    const wall = [
      { x: 1, y: 0 },
      { x: 1, y: 1 },
    ];

    expect(findPath({ x: 0, y: 0 }, { x: 2, y: 0 }, 3, 3, wall)).to.deep.equal([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: 0, y: 2 },
      { x: 1, y: 2 },
      { x: 2, y: 2 },
      { x: 2, y: 1 },
      { x: 2, y: 0 },
    ]);
  });

  it("returns an empty path for blocked, unreachable or out-of-grid endpoints", () => {
    const fullWall = [
      { x: 1, y: 0 },
      { x: 1, y: 1 },
      { x: 1, y: 2 },
    ];

    expect(findPath({ x: 0, y: 0 }, { x: 2, y: 0 }, 3, 3, fullWall)).to.deep.equal([]);
    expect(findPath({ x: 0, y: 0 }, { x: 2, y: 2 }, 3, 3, [{ x: 2, y: 2 }])).to.deep.equal([]);
    expect(findPath({ x: 0, y: 0 }, { x: 0, y: 0 }, 3, 3, [{ x: 0, y: 0 }])).to.deep.equal([]);
    expect(findPath({ x: 0, y: 0 }, { x: 3, y: 0 }, 3, 3)).to.deep.equal([]);
    expect(findPath({ x: -1, y: 0 }, { x: -1, y: 0 }, 3, 3)).to.deep.equal([]);
  });

  it("answers reachability through isPathClear", () => {
    expect(isPathClear({ x: 0, y: 0 }, { x: 2, y: 2 }, 3, 3)).to.equal(true);
    expect(isPathClear({ x: 0, y: 0 }, { x: 2, y: 2 }, 3, 3, [{ x: 1, y: 2 }, { x: 2, y: 1 }])).to.equal(false);
  });

  it("lists in-grid neighbours in a fixed order", () => {
    expect(neighbours({ x: 1, y: 1 }, 3, 3)).to.deep.equal([
      { x: 1, y: 2 },
      { x: 1, y: 0 },
      { x: 2, y: 1 },
      { x: 0, y: 1 },
    ]);
    expect(neighbours({ x: 0, y: 0 }, 3, 3)).to.deep.equal([
      { x: 0, y: 1 },
      { x: 1, y: 0 },
    ]);
  });

  it("finds shortest, contiguous and repeatable paths on open grids", () => {
    const scenario = fc
      .record({ width: fc.integer({ min: 1, max: 12 }), height: fc.integer({ min: 1, max: 12 }) })
      .chain(({ width, height }) =>
        fc.record({
          width: fc.constant(width),
          height: fc.constant(height),
          start: fc.record({ x: fc.integer({ min: 0, max: width - 1 }), y: fc.integer({ min: 0, max: height - 1 }) }),
          goal: fc.record({ x: fc.integer({ min: 0, max: width - 1 }), y: fc.integer({ min: 0, max: height - 1 }) }),
        }),
      );

    fc.assert(
      fc.property(scenario, ({ width, height, start, goal }) => {
        const path = findPath(start, goal, width, height);
        expect(path).to.have.length(manhattan(start, goal) + 1);
        expect(path[0]).to.deep.equal(start);
        expect(path[path.length - 1]).to.deep.equal(goal);
        for (let index = 1; index < path.length; index += 1) {
          expect(manhattan(path[index - 1], path[index])).to.equal(1);
        }
        expect(findPath(start, goal, width, height)).to.deep.equal(path);
      }),
    );
  });
});
