import { describe, it, expect } from "vitest";
import type { ExtractionResult } from "@docpipe/types";
import { Preprocessor } from "./preprocessor.js";
import { applyOcrCorrections } from "./ocr-corrections.js";
import { detectLanguage, needsTranslation } from "./language.js";
import { dedupeFragments, normalizeWhitespace } from "./normalize.js";

const MALAYALAM_PUMP = "പമ്പ്";

function extraction(overrides: Partial<ExtractionResult> = {}): ExtractionResult {
  return {
    processor: "image",
    text: "",
    fragments: [],
    extractionConfidence: 0.9,
    ocrConfidence: null,
    humanReview: false,
    warnings: [],
    metadata: {},
    ...overrides,
  };
}

describe("normalizeWhitespace", () => {
  it("collapses spaces and blank lines but keeps paragraph breaks", () => {
    expect(normalizeWhitespace("  a\t\t b \r\n\r\n\r\n\r\nc  d  ")).toBe("a b\n\nc d");
  });
});

describe("applyOcrCorrections", () => {
  it("fixes look-alike characters inside numbers", () => {
    expect(applyOcrCorrections("Inspected on 2O24-O3-l5")).toEqual({
      text: "Inspected on 2024-03-15",
      corrections: 1,
    });
  });

  it("fixes digits inside words and expands ligatures", () => {
    expect(applyOcrCorrections("c0ntr0l fai1ure ﬁlter")).toEqual({
      text: "control failure filter",
      corrections: 4,
    });
  });

  it("turns a lone bar into the pronoun", () => {
    expect(applyOcrCorrections("then | checked").text).toBe("then I checked");
  });

  it("leaves ordinary words alone", () => {
    expect(applyOcrCorrections("OIL BOIS Safety")).toEqual({ text: "OIL BOIS Safety", corrections: 0 });
  });
});

describe("detectLanguage", () => {
  it("classifies by script", () => {
    expect(detectLanguage("Pump failure").language).toBe("english");
    expect(detectLanguage(MALAYALAM_PUMP).language).toBe("malayalam");
    expect(detectLanguage(`Pump ${MALAYALAM_PUMP}`).language).toBe("mixed");
    expect(detectLanguage("1234 -- 56").language).toBe("unknown");
  });

  it("requires translation for any Malayalam content", () => {
    expect(needsTranslation("malayalam")).toBe(true);
    expect(needsTranslation("mixed")).toBe(true);
    expect(needsTranslation("english")).toBe(false);
    expect(needsTranslation("unknown")).toBe(false);
  });
});

describe("dedupeFragments", () => {
  it("drops empty and repeated fragments ignoring case and spacing", () => {
    expect(dedupeFragments(["Header", "", "HEADER ", "Body  text", "body text"])).toEqual({
      kept: ["Header", "Body  text"],
      dropped: 2,
    });
  });
});

describe("Preprocessor", () => {
  const preprocessor = new Preprocessor({ correctionConfidence: 0.85 });

  it("corrects low-confidence OCR output and drops duplicate pages", () => {
    const result = preprocessor.process(
      extraction({
        ocrConfidence: 0.7,
        fragments: [
          "Pump  c0ntr0l   fai1ure\r\n\r\n\r\nlogged 2O24-O3-l5",
          "PUMP CONTROL FAILURE logged 2024-03-15",
        ],
      }),
    );

    expect(result.text).toBe("Pump control failure\n\nlogged 2024-03-15");
    expect(result.fragments).toEqual(["Pump control failure\n\nlogged 2024-03-15"]);
    expect(result.correctionsApplied).toBe(4);
    expect(result.duplicatesDropped).toBe(1);
    expect(result.language).toBe("english");
    expect(result.needsTranslation).toBe(false);
    expect(result.confidence).toBe(0.7);
  });

  it("skips corrections when OCR confidence is high or OCR was not used", () => {
    const highOcr = preprocessor.process(extraction({ ocrConfidence: 0.95, fragments: ["c0ntr0l"] }));
    const parsed = preprocessor.process(
      extraction({ processor: "text", fragments: ["c0ntr0l"], extractionConfidence: 0.95 }),
    );

    expect(highOcr.text).toBe("c0ntr0l");
    expect(highOcr.correctionsApplied).toBe(0);
    expect(parsed.text).toBe("c0ntr0l");
    expect(parsed.confidence).toBe(0.95);
  });

  it("falls back to the full text when there are no fragments", () => {
    const result = preprocessor.process(extraction({ text: `Report ${MALAYALAM_PUMP}` }));

    expect(result.fragments).toEqual([`Report ${MALAYALAM_PUMP}`]);
    expect(result.language).toBe("mixed");
    expect(result.needsTranslation).toBe(true);
  });
});
