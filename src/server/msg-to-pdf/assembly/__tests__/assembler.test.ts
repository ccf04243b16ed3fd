import assert from "node:assert";
import { describe, it } from "node:test";
import { PDFDocument, StandardFonts } from "pdf-lib";
import { blankPdf } from "../../__tests__/fixtures/engines.js";
import { isConversionError } from "../../errors/index.js";
import { assemblePdf } from "../assembler.js";
import { wrapText } from "../banner.js";

async function widths(bytes: Uint8Array): Promise<number[]> {
  const doc = await PDFDocument.load(bytes);
  return doc.getPages().map((page) => Math.round(page.getWidth()));
}

describe("assemblePdf", () => {
  it("should place banner, body and fragments in order", async () => {
    const result = await assemblePdf({
      body: await blankPdf(1, [300, 300]),
      fragments: [await blankPdf(2, [400, 400]), await blankPdf(1, [500, 500])],
      banner: "message.msg",
    });

    assert.strictEqual(result.pageCount, 5);
    assert.deepStrictEqual(await widths(result.bytes), [595, 300, 400, 400, 500]);
  });

  it("should omit the banner when no source name is given", async () => {
    const result = await assemblePdf({ body: await blankPdf(2, [300, 300]), fragments: [] });

    assert.strictEqual(result.pageCount, 2);
    assert.deepStrictEqual(await widths(result.bytes), [300, 300]);
  });

  it("should give the same page count for the same input", async () => {
    const input = { body: await blankPdf(3), fragments: [await blankPdf(1)], banner: "a.msg" };
    const first = await assemblePdf(input);
    const second = await assemblePdf(input);

    assert.strictEqual(first.pageCount, 5);
    assert.strictEqual(second.pageCount, first.pageCount);
  });

  it("should set the document title", async () => {
    const result = await assemblePdf({ body: await blankPdf(1), fragments: [], title: "Quarterly numbers" });
    const doc = await PDFDocument.load(result.bytes);

    assert.strictEqual(doc.getTitle(), "Quarterly numbers");
  });

  it("should fail with AssemblyFailed when the body is not a PDF", async () => {
    await assert.rejects(
      assemblePdf({ body: new Uint8Array(Buffer.from("garbage")), fragments: [] }),
      (error: unknown) => {
        assert.ok(isConversionError(error));
        assert.strictEqual(error.kind, "AssemblyFailed");
        assert.ok(error.message.startsWith("Rendered body is not a well-formed PDF"), error.message);
        return true;
      },
    );
  });

  it("should name the fragment that failed to load", async () => {
    await assert.rejects(
      assemblePdf({ body: await blankPdf(1), fragments: [await blankPdf(1), new Uint8Array([0x25, 0x50])] }),
      (error: unknown) => {
        assert.ok(isConversionError(error));
        assert.ok(error.message.startsWith("Attachment fragment 2 is not a well-formed PDF"), error.message);
        return true;
      },
    );
  });
});

describe("wrapText", () => {
  it("should break between characters when a line is too wide", async () => {
    const doc = await PDFDocument.create();
    const font = await doc.embedFont(StandardFonts.Helvetica);

    assert.deepStrictEqual(wrapText("aaaa", font, 10, 12), ["aa", "aa"]);
    assert.deepStrictEqual(wrapText("short.msg", font, 10, 500), ["short.msg"]);
    assert.deepStrictEqual(wrapText("", font, 10, 500), []);
  });
});
