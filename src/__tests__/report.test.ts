import { describe, it, expect } from "vitest";
import { RECOMMENDATIONS, renderReportHtml, renderResultSection } from "../web/report.js";
import { analyze } from "../core/analyze.js";
import type { MeasurementSeries } from "../types.js";

const run: MeasurementSeries = [0, 100, 200, 300].map((x) => ({
  fringe_count: x,
  displacement_mm: 12.5 + x * 3.164e-4
}));

describe("renderResultSection", () => {
  const html = renderResultSection(analyze(run, { deviation_cm: 3, path_length_cm: 4 }));

  it("lists the formatted result fields", () => {
    expect(html).toContain("<div class=\"result-item\"><strong>Wavelength:</strong> 791.00 ± 0.00 nm</div>");
    expect(html).toContain("<strong>Relative uncertainty:</strong> 0.17%");
    expect(html).toContain("<strong>Data points:</strong> 4 over 300 fringes");
  });

  it("lists the corrections", () => {
    expect(html).toContain("<li>Backlash correction: not needed</li>");
    expect(html).toContain("<li>Path correction: 3 cm offset over 4 cm (cos θ = 0.800000)</li>");
  });
});

describe("renderReportHtml", () => {
  const result = analyze(run);

  it("produces a complete document with the chart embedded", () => {
    const html = renderReportHtml(result);

    expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(html).toContain("<title>Michelson interferometer analysis</title>");
    expect(html).toContain('<svg xmlns="http://www.w3.org/2000/svg"');
    expect(html.trimEnd().endsWith("</html>")).toBe(true);
  });

  it("includes every recommendation in order", () => {
    const html = renderReportHtml(result);
    RECOMMENDATIONS.forEach((text, i) => {
      expect(html).toContain(`<div class="result-item">${i + 1}. ${text}</div>`);
    });
  });

  it("shows dataset metadata and escapes the title", () => {
    const html = renderReportHtml(result, {
      title: "Run <1>",
      datasetId: "bench_a",
      measuredAt: "2025-03-12T14:30:00Z"
    });

    expect(html).toContain("<h1>Run &lt;1&gt;</h1>");
    expect(html).toContain('<p class="meta">Dataset bench_a, measured at 2025-03-12T14:30:00Z</p>');
  });

  it("omits the metadata line when nothing is known", () => {
    expect(renderReportHtml(result)).not.toContain('<p class="meta">');
  });
});
