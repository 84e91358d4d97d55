import { describe, expect, it } from "vitest";
import { RawAnnotation } from "./annotation";
import { parseBoundsString, resolvePixelBox } from "./geometry";

function annotation(
  properties: Record<string, unknown>,
  geometry: unknown = null
): RawAnnotation {
  return { properties, geometry };
}

const square_polygon = {
  type: "Polygon",
  coordinates: [
    [
      [10, 20],
      [30, 20],
      [30, 50],
      [10, 50],
      [10, 20],
    ],
    [
      [0, 0],
      [500, 500],
      [0, 500],
    ],
  ],
};

describe("parseBoundsString", () => {
  it("parses four comma separated numbers", () => {
    expect(parseBoundsString("100, 200 ,300,400")).toEqual({
      xmin: 100,
      ymin: 200,
      xmax: 300,
      ymax: 400,
    });
    expect(parseBoundsString("1.5,2.25,3,4")).toEqual({
      xmin: 1.5,
      ymin: 2.25,
      xmax: 3,
      ymax: 4,
    });
  });

  it("rejects missing or non-numeric fields", () => {
    expect(parseBoundsString("1,2,3")).toBeNull();
    expect(parseBoundsString("1,2,3,4,5")).toBeNull();
    expect(parseBoundsString("1,2,,4")).toBeNull();
    expect(parseBoundsString("1,2,x,4")).toBeNull();
    expect(parseBoundsString("nan,2,3,4")).toBeNull();
    expect(parseBoundsString("0x10,0x10,0x20,0x20")).toBeNull();
    expect(parseBoundsString("1,2,3,Infinity")).toBeNull();
    expect(parseBoundsString("1e2,-2,+3.5,.5")).toEqual({
      xmin: 100,
      ymin: -2,
      xmax: 3.5,
      ymax: 0.5,
    });
  });
});

describe("resolvePixelBox", () => {
  it("prefers the bounds string", () => {
    const result = resolvePixelBox(
      annotation({ bounds_imcoords: "1,2,3,4" }, square_polygon)
    );
    expect(result).toEqual({
      type: "ok",
      key: "bounds_imcoords",
      value: { xmin: 1, ymin: 2, xmax: 3, ymax: 4 },
    });
  });

  it("uses the first ring of a polygon", () => {
    expect(resolvePixelBox(annotation({}, square_polygon))).toEqual({
      type: "ok",
      key: "geometry",
      value: { xmin: 10, ymin: 20, xmax: 30, ymax: 50 },
    });
  });

  it("uses the first polygon of a multipolygon", () => {
    const geometry = {
      type: "MultiPolygon",
      coordinates: [
        [
          [
            [5, 6],
            [7, 6],
            [7, 9],
          ],
        ],
        [
          [
            [100, 100],
            [200, 200],
          ],
        ],
      ],
    };
    expect(resolvePixelBox(annotation({}, geometry))).toEqual({
      type: "ok",
      key: "geometry",
      value: { xmin: 5, ymin: 6, xmax: 7, ymax: 9 },
    });
  });

  it("falls back to the geometry when the bounds string is malformed", () => {
    const result = resolvePixelBox(
      annotation({ bounds_imcoords: "1,2,3" }, square_polygon)
    );
    expect(result).toEqual({
      type: "ok",
      key: "geometry",
      value: { xmin: 10, ymin: 20, xmax: 30, ymax: 50 },
    });
  });

  it("reports a malformed bounds string without geometry as invalid", () => {
    const result = resolvePixelBox(annotation({ bounds_imcoords: "a,b,c,d" }));
    expect(result.type).toBe("invalid");
  });

  it("reports unsupported geometry as invalid", () => {
    expect(
      resolvePixelBox(annotation({}, { type: "Point", coordinates: [1, 2] }))
        .type
    ).toBe("invalid");
    expect(
      resolvePixelBox(annotation({}, { type: "Polygon", coordinates: [[]] }))
        .type
    ).toBe("invalid");
    expect(
      resolvePixelBox(annotation({ bounds_imcoords: 1234 })).type
    ).toBe("invalid");
  });

  it("reports a record without any box encoding as missing", () => {
    expect(resolvePixelBox(annotation({ bounds_imcoords: "" }))).toEqual({
      type: "missing",
    });
  });
});
