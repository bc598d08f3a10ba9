import { describe, it, expect } from "vitest";
import sharp from "sharp";
import { ExtractionError, InvariantViolationError, RetryPolicy, TransientIOError } from "@docpipe/errors";
import { ParserRegistry, TextParser, type IOcrEngine, type IParser } from "@docpipe/parser";
import type { ExtractionContext, ExtractionResult, OcrResult, ParseResult } from "@docpipe/types";
import { TextDocumentProcessor } from "./text-processor.js";
import { ImageProcessor } from "./image-processor.js";
import { FallbackProcessor } from "./fallback-processor.js";
import { createProcessorRegistry } from "./registry.js";
import { CadProcessor } from "./cad-processor.js";
import type { IFormatProcessor } from "./processor.interface.js";

const enc = (s: string) => new TextEncoder().encode(s);
const policy = new RetryPolicy({ maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, timeoutMs: 1_000 });

function context(overrides: Partial<ExtractionContext> = {}): ExtractionContext {
  return { documentId: "doc-1", filename: "file.txt", mimeType: "text/plain", enhanced: false, ...overrides };
}

function fakeParser(result: ParseResult): IParser & { calls: string[] } {
  const calls: string[] = [];
  return {
    supportedMimeTypes: ["application/pdf", "application/msword"],
    calls,
    parse: async (_input, mimeType) => {
      calls.push(mimeType);
      return result;
    },
  };
}

describe("TextDocumentProcessor", () => {
  it("extracts plain text with high confidence", async () => {
    const processor = new TextDocumentProcessor(new ParserRegistry(), policy);

    const result = await processor.extract(enc("First paragraph.\n\nSecond."), "text", context());

    expect(result.text).toBe("First paragraph.\n\nSecond.");
    expect(result.fragments).toEqual(["First paragraph.\n\nSecond."]);
    expect(result.extractionConfidence).toBe(0.95);
    expect(result.ocrConfidence).toBeNull();
    expect(result.processor).toBe("text");
  });

  it("flags image-only PDF pages instead of dropping them silently", async () => {
    const docling = fakeParser({
      text: "",
      pageCount: 3,
      pages: [
        { text: "Page one text", hasImages: false },
        { text: "  ", hasImages: true },
        { text: "Page three", hasImages: true },
      ],
      metadata: {},
    });
    const processor = new TextDocumentProcessor({ getParser: () => docling }, policy);

    const result = await processor.extract(enc("%PDF-1.7"), "pdf", context({ mimeType: "application/pdf" }));

    expect(result.fragments).toEqual(["Page one text", "Page three"]);
    expect(result.text).toBe("Page one text\n\nPage three");
    expect(result.extractionConfidence).toBeCloseTo(0.6, 10);
    expect(result.metadata["imageOnlyPages"]).toEqual([2]);
    expect(result.metadata["mixedContentLoss"]).toBe(true);
    expect(result.warnings).toEqual(["Pages 2 contain only images; their content is not extracted"]);
  });

  it("reports full structured confidence for a clean text layer", async () => {
    const docling = fakeParser({
      text: "",
      pageCount: 1,
      pages: [{ text: "Clean text layer.", hasImages: true }],
      metadata: {},
    });
    const processor = new TextDocumentProcessor({ getParser: () => docling }, policy);

    const result = await processor.extract(enc("%PDF"), "pdf", context({ mimeType: "application/pdf" }));

    expect(result.extractionConfidence).toBe(0.9);
    expect(result.metadata["mixedContentLoss"]).toBeUndefined();
  });

  it("routes an untyped office container to the document converter", async () => {
    const docling = fakeParser({ text: "", pageCount: 1, pages: [{ text: "Ledger", hasImages: false }], metadata: {} });
    const text = new TextParser();
    const lookup = { getParser: (mime: string) => (docling.supportedMimeTypes.includes(mime) ? docling : text) };
    const processor = new TextDocumentProcessor(lookup, policy);

    await processor.extract(enc("ole"), "office", context({ mimeType: "application/x-ole-storage" }));

    expect(docling.calls).toEqual(["application/msword"]);
  });

  it("throws ExtractionError when no text comes out", async () => {
    const docling = fakeParser({ text: "", pageCount: 1, pages: [{ text: "", hasImages: false }], metadata: {} });
    const processor = new TextDocumentProcessor({ getParser: () => docling }, policy);

    await expect(
      processor.extract(enc("%PDF"), "pdf", context({ mimeType: "application/pdf" })),
    ).rejects.toBeInstanceOf(ExtractionError);
  });
});

function fakeOcr(results: Array<OcrResult | Error>): IOcrEngine & { calls: Array<{ image: Uint8Array; languages: string[] }> } {
  const calls: Array<{ image: Uint8Array; languages: string[] }> = [];
  return {
    name: "fake-ocr",
    calls,
    recognize: async (image, languages) => {
      calls.push({ image, languages });
      const next = results.length > 1 ? results.shift() : results[0];
      if (next === undefined) throw new Error("no scripted result");
      if (next instanceof Error) throw next;
      return next;
    },
  };
}

const OCR_OK: OcrResult = {
  text: "Brake inspection due\n\nഅടിയന്തര പരിശോധന",
  confidence: 0.72,
  words: [],
  languages: ["eng", "mal"],
};

describe("ImageProcessor", () => {
  it("runs OCR once with both languages on already-enhanced bytes", async () => {
    const ocr = fakeOcr([OCR_OK]);
    const processor = new ImageProcessor(ocr, ["eng", "mal"], policy);
    const bytes = enc("already enhanced png");

    const result = await processor.extract(bytes, "image", context({ filename: "scan.jpg", enhanced: true }));

    expect(ocr.calls).toHaveLength(1);
    expect(ocr.calls[0]?.languages).toEqual(["eng", "mal"]);
    expect(ocr.calls[0]?.image).toBe(bytes);
    expect(result.ocrConfidence).toBe(0.72);
    expect(result.extractionConfidence).toBe(0.72);
    expect(result.fragments).toEqual(["Brake inspection due", "അടിയന്തര പരിശോധന"]);
    expect(result.metadata["enhancementSteps"]).toEqual([]);
  });

  it("enhances raw images before OCR", async () => {
    const ocr = fakeOcr([OCR_OK]);
    const processor = new ImageProcessor(ocr, ["eng", "mal"], policy);
    const jpeg = await sharp({
      create: { width: 20, height: 10, channels: 3, background: { r: 200, g: 200, b: 200 } },
    })
      .jpeg()
      .toBuffer();

    const result = await processor.extract(jpeg, "image", context({ filename: "scan.jpg" }));

    const sent = ocr.calls[0]?.image;
    expect(sent && Buffer.from(sent).subarray(1, 4).toString("ascii")).toBe("PNG");
    expect(result.metadata["enhancementSteps"]).toEqual(["median_denoise", "contrast_normalize", "sharpen"]);
    expect(result.metadata["width"]).toBe(20);
  });

  it("retries a failed OCR call", async () => {
    const ocr = fakeOcr([new TransientIOError("tesseract crashed", "ocr"), OCR_OK]);
    const processor = new ImageProcessor(ocr, ["eng", "mal"], policy);

    const result = await processor.extract(enc("png"), "image", context({ enhanced: true }));

    expect(ocr.calls).toHaveLength(2);
    expect(result.text).toBe(OCR_OK.text);
  });

  it("gives up after the retry budget", async () => {
    const ocr = fakeOcr([new TransientIOError("tesseract crashed", "ocr")]);
    const processor = new ImageProcessor(ocr, ["eng", "mal"], policy);

    await expect(processor.extract(enc("png"), "image", context({ enhanced: true }))).rejects.toBeInstanceOf(
      TransientIOError,
    );
    expect(ocr.calls).toHaveLength(3);
  });

  it("throws ExtractionError when OCR reads nothing", async () => {
    const ocr = fakeOcr([{ text: "  ", confidence: 0, words: [], languages: ["eng"] }]);
    const processor = new ImageProcessor(ocr, ["eng"], policy);

    await expect(processor.extract(enc("png"), "image", context({ enhanced: true }))).rejects.toBeInstanceOf(
      ExtractionError,
    );
  });
});

describe("CadProcessor", () => {
  const processor = new CadProcessor();

  it("reads the DXF header and title block", async () => {
    const dxf = [
      "  0", "SECTION", "  2", "HEADER", "  9", "$ACADVER", "  1", "AC1015", "  0", "ENDSEC",
      "  0", "SECTION", "  2", "ENTITIES",
      "  0", "ATTRIB", "  8", "TITLEBLOCK", "  1", "KM-EL-0042", "  2", "DWGNO",
      "  0", "ATTRIB", "  1", "C", "  2", "REV",
      "  0", "ATTRIB", "  1", "1:50", "  2", "SCALE",
      "  0", "ATTRIB", "  1", "Depot traction substation layout", "  2", "TITLE",
      "  0", "ENDSEC", "  0", "EOF",
    ].join("\n");

    const result = await processor.extract(
      enc(dxf),
      "cad",
      context({ filename: "substation.dxf", mimeType: "image/vnd.dxf" }),
    );

    expect(result.text).toBe(
      [
        "Technical file: substation.dxf",
        "Format: Drawing Exchange Format",
        "Category: 2D_Drawing",
        "Title: Depot traction substation layout",
        "Drawing number: KM-EL-0042",
        "Revision: C",
        "Scale: 1:50",
        "Version: AutoCAD 2000",
        "[FLAGGED FOR SPECIALIZED VIEWER] Open with AutoCAD, FreeCAD, or online DWG viewers for full content.",
      ].join("\n"),
    );
    expect(result.extractionConfidence).toBe(0.6);
    expect(result.metadata["drawingNumber"]).toBe("KM-EL-0042");
    expect(result.metadata["requiresSpecializedViewer"]).toBe(true);
    expect(result.metadata["formatCategory"]).toBe("2D_Drawing");
  });

  it("reads the DWG version string", async () => {
    const result = await processor.extract(
      enc("AC1032\0\0\0\0\0"),
      "cad",
      context({ filename: "track.dwg", mimeType: "image/vnd.dwg" }),
    );

    expect(result.metadata["version"]).toBe("AC1032");
    expect(result.metadata["release"]).toBe("AutoCAD 2018");
  });

  it("reads the STEP header section", async () => {
    const step = [
      "ISO-10303-21;",
      "HEADER;",
      "FILE_DESCRIPTION(('Bogie frame assembly'),'2;1');",
      "FILE_NAME('bogie_frame.stp','2024-01-10T10:00:00',('author'),(''),'','','');",
      "FILE_SCHEMA(('AUTOMOTIVE_DESIGN'));",
      "ENDSEC;",
    ].join("\n");

    const result = await processor.extract(enc(step), "cad", context({ filename: "bogie.stp", mimeType: "model/step" }));

    expect(result.metadata["title"]).toBe("bogie_frame.stp");
    expect(result.metadata["description"]).toBe("Bogie frame assembly");
    expect(result.metadata["version"]).toBe("AUTOMOTIVE_DESIGN");
    expect(result.metadata["formatCategory"]).toBe("3D_Model");
  });

  it("still produces a flagged placeholder for an unrecognized container", async () => {
    const result = await processor.extract(
      enc("binary"),
      "cad",
      context({ filename: "part.cad", mimeType: "application/octet-stream" }),
    );

    expect(result.text).toContain("[FLAGGED FOR SPECIALIZED VIEWER]");
    expect(result.warnings).toEqual(["No container metadata found"]);
    expect(result.metadata["format"]).toBe("unknown");
  });
});

function scripted(name: "text" | "image", outcome: ExtractionResult | Error): IFormatProcessor & { calls: number } {
  const processor: IFormatProcessor & { calls: number } = {
    name,
    calls: 0,
    extract: async () => {
      processor.calls += 1;
      if (outcome instanceof Error) throw outcome;
      return outcome;
    },
  };
  return processor;
}

function extraction(processor: "text" | "image", text: string): ExtractionResult {
  return {
    processor,
    text,
    fragments: [text],
    extractionConfidence: 0.7,
    ocrConfidence: null,
    humanReview: false,
    warnings: [],
    metadata: {},
  };
}

describe("FallbackProcessor", () => {
  it("uses the text reading when it is readable", async () => {
    const text = scripted("text", extraction("text", "readable words"));
    const image = scripted("image", extraction("image", "ocr words"));

    const result = await new FallbackProcessor(text, image).extract(enc("x"), "unknown", context());

    expect(result.processor).toBe("fallback");
    expect(result.text).toBe("readable words");
    expect(result.metadata["delegate"]).toBe("text");
    expect(image.calls).toBe(0);
  });

  it("moves on to OCR when the text reading is binary noise", async () => {
    const text = scripted("text", extraction("text", "\u0001\u0002\u0003\u0004ab"));
    const image = scripted("image", extraction("image", "ocr words"));

    const result = await new FallbackProcessor(text, image).extract(enc("x"), "unknown", context());

    expect(result.text).toBe("ocr words");
    expect(result.metadata["delegate"]).toBe("image");
    expect(result.warnings).toEqual(["text: EXTRACTION_ERROR: Content is not readable text"]);
  });

  it("returns an empty human-review result when everything fails", async () => {
    const text = scripted("text", new ExtractionError("no text", "text"));
    const image = scripted("image", new TransientIOError("ocr down", "ocr"));

    const result = await new FallbackProcessor(text, image).extract(enc("x"), "unknown", context());

    expect(result).toEqual({
      processor: "fallback",
      text: "",
      fragments: [],
      extractionConfidence: 0,
      ocrConfidence: null,
      humanReview: true,
      warnings: ["text: EXTRACTION_ERROR: no text", "image: TRANSIENT_IO_ERROR: ocr down"],
      metadata: { attempts: ["text", "image"] },
    });
  });

  it("skips a processor that already failed on the same bytes", async () => {
    const text = scripted("text", new ExtractionError("no text", "text"));
    const image = scripted("image", extraction("image", "ocr words"));

    const result = await new FallbackProcessor(text, image).extract(
      enc("x"),
      "image",
      context({ attempted: ["image"] }),
    );

    expect(image.calls).toBe(0);
    expect(text.calls).toBe(1);
    expect(result.humanReview).toBe(true);
    expect(result.metadata).toEqual({ attempts: ["text"] });
  });

  it("rethrows invariant violations", async () => {
    const text = scripted("text", new InvariantViolationError("corrupt"));
    const image = scripted("image", extraction("image", "ocr words"));

    await expect(new FallbackProcessor(text, image).extract(enc("x"), "unknown", context())).rejects.toBeInstanceOf(
      InvariantViolationError,
    );
    expect(image.calls).toBe(0);
  });
});

describe("createProcessorRegistry", () => {
  const registry = createProcessorRegistry({ ocrLanguages: ["eng", "mal"], policy, ocr: fakeOcr([OCR_OK]) });

  it("resolves each category once to its processor", () => {
    expect(registry.resolve("pdf").name).toBe("text");
    expect(registry.resolve("office").name).toBe("text");
    expect(registry.resolve("text").name).toBe("text");
    expect(registry.resolve("image").name).toBe("image");
    expect(registry.resolve("cad").name).toBe("cad");
    expect(registry.resolve("unknown").name).toBe("fallback");
  });

  it("does not enhance or OCR an image a second time after the image processor found nothing", async () => {
    const ocr = fakeOcr([{ text: " ", confidence: 0, words: [], languages: ["eng"] }]);
    const blank = fakeParser({ text: "", pageCount: 1, pages: [], metadata: {} });
    const images = createProcessorRegistry({
      ocrLanguages: ["eng"],
      policy,
      ocr,
      parsers: { getParser: () => blank },
    });
    const jpeg = await sharp({
      create: { width: 12, height: 12, channels: 3, background: { r: 90, g: 90, b: 90 } },
    })
      .jpeg()
      .toBuffer();
    const ctx = context({ filename: "scan.jpg", mimeType: "image/jpeg" });

    await expect(images.resolve("image").extract(jpeg, "image", ctx)).rejects.toBeInstanceOf(ExtractionError);
    const result = await images.fallback.extract(jpeg, "image", { ...ctx, attempted: ["image"] });

    expect(ocr.calls).toHaveLength(1);
    expect(blank.calls).toEqual(["image/jpeg"]);
    expect(result.humanReview).toBe(true);
    expect(result.metadata).toEqual({ attempts: ["text"] });
  });

  it("lets a new type be registered", () => {
    const custom = scripted("text", extraction("text", "custom"));
    registry.register("unknown", custom);
    expect(registry.resolve("unknown")).toBe(custom);
  });
});
