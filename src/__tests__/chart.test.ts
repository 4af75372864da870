import { describe, it, expect } from "vitest";
import { linearScale, niceTicks, paddedDomain, renderFitChartSvg } from "../web/chart.js";
import { analyze } from "../core/analyze.js";
import { seriesFromColumns } from "../core/input/parse.js";
import type { MeasurementSeries } from "../types.js";

const run: MeasurementSeries = [0, 100, 200, 300, 400].map((x) => ({
  fringe_count: x,
  displacement_mm: 12.5 + x * 3.164e-4
}));

describe("niceTicks", () => {
  it("uses a 1-2-5 step", () => {
    expect(niceTicks(0, 550)).toEqual([0, 100, 200, 300, 400, 500]);
    expect(niceTicks(-27.5, 577.5)).toEqual([0, 100, 200, 300, 400, 500]);
    expect(niceTicks(54.4, 54.6)).toEqual([54.4, 54.45, 54.5, 54.55, 54.6]);
  });

  it("returns a single tick for an empty span", () => {
    expect(niceTicks(3, 3)).toEqual([3]);
  });

  it("falls back to the end points when the step is below float resolution", () => {
    expect(niceTicks(54.41, 54.410000000000004)).toEqual([54.41, 54.410000000000004]);
  });
});

describe("paddedDomain", () => {
  it("pads by a fraction of the span", () => {
    expect(paddedDomain([0, 100])).toEqual([-5, 105]);
  });

  it("handles long series", () => {
    const values = Array.from({ length: 300_000 }, (_, i) => i);
    const [lo, hi] = paddedDomain(values);
    expect(lo).toBeCloseTo(-14999.95, 6);
    expect(hi).toBeCloseTo(314998.95, 6);
  });

  it("pads a single value", () => {
    expect(paddedDomain([20, 20])).toEqual([19, 21]);
    expect(paddedDomain([0])).toEqual([-1, 1]);
  });
});

describe("linearScale", () => {
  it("maps the domain onto the range", () => {
    const scale = linearScale([0, 10], [100, 0]);
    expect(scale(0)).toBe(100);
    expect(scale(5)).toBe(50);
    expect(scale(10)).toBe(0);
  });
});

describe("renderFitChartSvg", () => {
  const result = analyze(run);
  const svg = renderFitChartSvg(result);

  it("draws one marker per point and a single fit line", () => {
    expect(svg.match(/<circle class="point"/g)).toHaveLength(5);
    expect(svg.match(/<line class="fit"/g)).toHaveLength(1);
  });

  it("spans the fit line over the plotted points", () => {
    // Padded x domain is [-20, 420] on the 96..776 px plot
    const fit = svg.split("\n").find((line) => line.startsWith('<line class="fit"'));
    expect(fit).toContain('x1="126.91"');
    expect(fit).toContain('x2="745.09"');
  });

  it("annotates the result", () => {
    expect(svg).toContain('<text class="annotation" x="108" y="72">λ = 632.80 ± 0.00 nm</text>');
    expect(svg).toContain("R² = 1.000000");
  });

  it("uses the requested size and escapes the title", () => {
    const small = renderFitChartSvg(result, { width: 400, height: 300, title: "Run <A>" });
    expect(small.startsWith('<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 400 300"')).toBe(true);
    expect(small).toContain("Run &lt;A&gt;");
  });

  it("produces no NaN coordinates", () => {
    expect(svg).not.toContain("NaN");
  });

  it("renders a nearly flat run", () => {
    const flat = analyze(
      seriesFromColumns([0, 1, 2, 3], [54.41, 54.41, 54.41, 54.410000000000004]),
      { correct_backlash: false }
    );
    const flatSvg = renderFitChartSvg(flat);

    expect(flat.slope_mm_per_fringe).toBeGreaterThan(0);
    expect(flatSvg.match(/<circle class="point"/g)).toHaveLength(4);
    expect(flatSvg).toContain(">54.409999999999997</text>");
    expect(flatSvg).not.toContain("NaN");
  });
});
