import { describe, it, expect } from "vitest";
import { TextParser } from "./text-parser.js";
import { DoclingParser } from "./docling-parser.js";
import { ParserRegistry } from "./factory.js";

describe("TextParser", () => {
  const parser = new TextParser();

  it("supports text MIME types", () => {
    expect(parser.supportedMimeTypes).toContain("text/plain");
    expect(parser.supportedMimeTypes).toContain("text/markdown");
    expect(parser.supportedMimeTypes).toContain("text/csv");
    expect(parser.supportedMimeTypes).toContain("text/html");
  });

  it("parses plain text string", async () => {
    const result = await parser.parse("Hello world", "text/plain");

    expect(result.text).toBe("Hello world");
    expect(result.pageCount).toBe(1);
    expect(result.pages).toEqual([{ text: "Hello world", hasImages: false }]);
    expect(result.metadata).toHaveProperty("charCount", 11);
    expect(result.metadata).toHaveProperty("wordCount", 2);
  });

  it("parses Uint8Array input", async () => {
    const input = new TextEncoder().encode("Encoded text");
    const result = await parser.parse(input, "text/plain");

    expect(result.text).toBe("Encoded text");
  });

  it("splits pages on form feeds and skips blank ones", async () => {
    const result = await parser.parse("Page one\fPage two\f  \f", "text/plain");

    expect(result.pageCount).toBe(2);
    expect(result.pages.map((p) => p.text)).toEqual(["Page one", "Page two"]);
    expect(result.text).toBe("Page one\n\nPage two");
  });

  it("strips HTML tags and keeps block breaks", async () => {
    const html = "<h1>Title</h1><p>Content with <b>bold</b> text</p>";
    const result = await parser.parse(html, "text/html");

    expect(result.text).toBe("Title\n\nContent with bold text");
  });

  it("strips script and style tags from HTML", async () => {
    const html = '<script>alert("x")</script><style>body{color:red}</style><p>Safe content</p>';
    const result = await parser.parse(html, "text/html");

    expect(result.text).toBe("Safe content");
  });
});

describe("DoclingParser", () => {
  const parser = new DoclingParser();

  it("supports PDF and office MIME types", () => {
    expect(parser.supportedMimeTypes).toContain("application/pdf");
    expect(parser.supportedMimeTypes).toContain(
      "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
    );
    expect(parser.supportedMimeTypes).toContain("application/msword");
  });

  it("rejects when Python/Docling is not available", async () => {
    const missing = new DoclingParser("nonexistent-python", "nonexistent-script.py");
    await expect(missing.parse("test", "application/pdf")).rejects.toThrow(/Failed to run docling/);
  });
});

describe("ParserRegistry", () => {
  const registry = new ParserRegistry();

  it("selects the parser by MIME type", () => {
    expect(registry.getParser("text/plain")).toBeInstanceOf(TextParser);
    expect(registry.getParser("application/pdf")).toBeInstanceOf(DoclingParser);
  });

  it("defaults to the text parser for unknown types", () => {
    expect(registry.getParser("application/unknown")).toBeInstanceOf(TextParser);
  });

  it("builds Docling with the configured interpreter", async () => {
    const configured = new ParserRegistry({ doclingPython: "nonexistent-python" });
    await expect(configured.getParser("application/pdf").parse("x", "application/pdf")).rejects.toThrow(
      /nonexistent-python|ENOENT/,
    );
  });
});
