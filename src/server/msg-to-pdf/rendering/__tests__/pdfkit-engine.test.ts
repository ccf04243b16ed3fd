import assert from "node:assert";
import { describe, it } from "node:test";
import { PDFDocument, PDFName, PDFRawStream } from "pdf-lib";
import { gifImage, pngImage } from "../../__tests__/fixtures/engines.js";
import { defaultTextFont, TextFont } from "../fonts.js";
import { imagePlaceholder, loadInlineImage, PdfKitEngine, splitMarkup } from "../pdfkit-engine.js";
import { toWinAnsi } from "../win-ansi.js";

function imageCount(doc: PDFDocument): number {
  return doc.context
    .enumerateIndirectObjects()
    .filter(([, object]) => object instanceof PDFRawStream && object.dict.get(PDFName.of("Subtype")) === PDFName.of("Image"))
    .length;
}

function dataUri(type: string, bytes: Uint8Array): string {
  return `data:${type};base64,${Buffer.from(bytes).toString("base64")}`;
}

describe("splitMarkup", () => {
  it("should split text runs around images", () => {
    assert.deepStrictEqual(splitMarkup('<p>Before</p><img alt="x" src="data:image/png;base64,AA"><p>After</p>'), [
      { kind: "markup", html: "<p>Before</p>" },
      { kind: "image", src: "data:image/png;base64,AA" },
      { kind: "markup", html: "<p>After</p>" },
    ]);
  });

  it("should accept unquoted and single-quoted sources", () => {
    assert.deepStrictEqual(splitMarkup("<img src=a.png><IMG SRC='b.png'>"), [
      { kind: "image", src: "a.png" },
      { kind: "image", src: "b.png" },
    ]);
  });

  it("should return a single block when there are no images", () => {
    assert.deepStrictEqual(splitMarkup("<p>text</p>"), [{ kind: "markup", html: "<p>text</p>" }]);
  });
});

describe("imagePlaceholder", () => {
  it("should name the image type of a data URI", () => {
    assert.strictEqual(imagePlaceholder("data:image/gif;base64,R0lG"), "[image: image/gif]");
  });

  it("should show unresolved references", () => {
    assert.strictEqual(imagePlaceholder("cid:missing"), "[image: cid:missing]");
    assert.strictEqual(imagePlaceholder(""), "[image]");
  });
});

describe("toWinAnsi", () => {
  it("should keep Latin-1 and WinAnsi punctuation", () => {
    assert.strictEqual(toWinAnsi("Café \u2013 \u20ac5 \u201cquoted\u201d"), "Café \u2013 \u20ac5 \u201cquoted\u201d");
  });

  it("should replace characters outside WinAnsi", () => {
    assert.strictEqual(toWinAnsi("ok \u2713 \u4e2d"), "ok ? ?");
  });
});

describe("TextFont", () => {
  it("should replace only the characters the font has no glyph for", () => {
    const font = new TextFont("test.ttf", (codePoint) => codePoint < 0x0500);

    assert.strictEqual(font.sanitize("\u041f\u0440\u0438\u0432\u0435\u0442, \u4f60\u597d"), "\u041f\u0440\u0438\u0432\u0435\u0442, ??");
    assert.strictEqual(font.sanitize("a\tb\nc"), "a\tb\nc");
  });

  it("should keep Helvetica to WinAnsi", () => {
    const font = TextFont.standard();

    assert.strictEqual(font.embedded, false);
    assert.strictEqual(font.sanitize("Caf\u00e9 \u2713"), "Caf\u00e9 ?");
  });

  it("should draw Cyrillic and Greek with the bundled font", () => {
    const font = defaultTextFont();

    assert.strictEqual(font.embedded, true);
    assert.strictEqual(font.sanitize("\u041f\u0440\u0438\u0432\u0435\u0442 \u03b1\u03b2"), "\u041f\u0440\u0438\u0432\u0435\u0442 \u03b1\u03b2");
  });
});

describe("loadInlineImage", () => {
  it("should transcode GIF data to PNG", async () => {
    const image = await loadInlineImage(dataUri("image/gif", await gifImage(16, 12)));

    assert.strictEqual(image?.format, "png");
    assert.strictEqual(image?.width, 16);
    assert.strictEqual(image?.height, 12);
  });

  it("should skip references and undecodable data", async () => {
    assert.strictEqual(await loadInlineImage("cid:logo"), undefined);
    assert.strictEqual(await loadInlineImage("data:image/gif;base64,AAAA"), undefined);
  });
});

describe("PdfKitEngine", () => {
  it("should render a document to a loadable PDF", async () => {
    const bytes = await new PdfKitEngine().render("<html><body><h1>Title</h1><p>Hello</p></body></html>", {
      title: "Hello",
    });

    assert.strictEqual(Buffer.from(bytes.subarray(0, 5)).toString("latin1"), "%PDF-");
    const doc = await PDFDocument.load(bytes);
    assert.strictEqual(doc.getPageCount(), 1);
  });

  it("should draw inline PNG images", async () => {
    const png = Buffer.from(await pngImage(40, 20)).toString("base64");
    const bytes = await new PdfKitEngine().render(`<p>Logo:</p><img src="data:image/png;base64,${png}">`, {
      title: "Images",
    });

    const doc = await PDFDocument.load(bytes);
    assert.strictEqual(doc.getPageCount(), 1);
    assert.strictEqual(imageCount(doc), 1);
  });

  it("should draw inline GIF images instead of a placeholder", async () => {
    const gif = dataUri("image/gif", await gifImage(40, 20));
    const bytes = await new PdfKitEngine().render(`<p>Signature</p><img src="${gif}">`, { title: "Signature" });

    assert.strictEqual(imageCount(await PDFDocument.load(bytes)), 1);
  });

  it("should render text in scripts outside WinAnsi", async () => {
    const bytes = await new PdfKitEngine().render("<p>\u041f\u0440\u0438\u0432\u0435\u0442</p>", {
      title: "\u041f\u0440\u0438\u0432\u0435\u0442",
    });

    assert.strictEqual((await PDFDocument.load(bytes)).getPageCount(), 1);
  });

  it("should break long text across pages", async () => {
    const paragraphs = Array.from({ length: 200 }, (_, i) => `<p>Paragraph ${i + 1}</p>`).join("");
    const bytes = await new PdfKitEngine().render(paragraphs, { title: "Long" });

    const doc = await PDFDocument.load(bytes);
    assert.ok(doc.getPageCount() > 1, `expected several pages, got ${doc.getPageCount()}`);
  });
});
