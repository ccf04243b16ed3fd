import assert from "node:assert";
import { mkdir, symlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, describe, it } from "node:test";
import { PDFDocument } from "pdf-lib";
import request from "supertest";
import { FailingEngine, RecordingEngine, silentLogger } from "../msg-to-pdf/__tests__/fixtures/engines.js";
import { pdfAttachment, sampleMsg, TempDirs } from "../msg-to-pdf/__tests__/fixtures/messages.js";
import { ConversionError, type RenderingEngine } from "../msg-to-pdf/index.js";
import { createApp, statusFor } from "../app.js";
import { type AppConfig, DEFAULT_CONFIG } from "../config.js";

const temp = new TempDirs();
afterEach(() => temp.cleanup());

function app(engine: RenderingEngine = new RecordingEngine(), config: AppConfig = DEFAULT_CONFIG) {
  return createApp({ config, logger: silentLogger, engine });
}

function batchApp(batchRoot: string) {
  return app(new RecordingEngine(), { ...DEFAULT_CONFIG, batchRoot });
}

async function pageCount(body: unknown): Promise<number> {
  assert.ok(Buffer.isBuffer(body), "response body should be binary");
  return (await PDFDocument.load(body)).getPageCount();
}

describe("GET /api/health", () => {
  it("should report ok", async () => {
    const res = await request(app()).get("/api/health");

    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { status: "ok" });
  });
});

describe("POST /api/convert", () => {
  it("should return the PDF as an attachment", async () => {
    const res = await request(app())
      .post("/api/convert")
      .query({ name: "status.msg" })
      .set("Content-Type", "application/vnd.ms-outlook")
      .send(Buffer.from(sampleMsg({ subject: "Status", attachments: [await pdfAttachment("q1.pdf", 3)] })))
      .responseType("blob");

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.headers["content-type"], "application/pdf");
    assert.strictEqual(res.headers["content-disposition"], 'attachment; filename="status.pdf"');
    assert.strictEqual(await pageCount(res.body), 5);
  });

  it("should honour the banner and merge switches", async () => {
    const res = await request(app())
      .post("/api/convert")
      .query({ banner: "false", merge: "0" })
      .send(Buffer.from(sampleMsg({ attachments: [await pdfAttachment("q1.pdf", 3)] })))
      .responseType("blob");

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.headers["content-disposition"], 'attachment; filename="message.pdf"');
    assert.strictEqual(await pageCount(res.body), 1);
  });

  it("should replace characters not allowed in the download name", async () => {
    const res = await request(app())
      .post("/api/convert")
      .query({ name: 'résumé "final".msg' })
      .send(Buffer.from(sampleMsg()))
      .responseType("blob");

    assert.strictEqual(res.headers["content-disposition"], 'attachment; filename="r_sum_ _final_.pdf"');
  });

  it("should reject an empty upload", async () => {
    const res = await request(app()).post("/api/convert");

    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(res.body, { error: "No file provided" });
  });

  it("should answer 422 for a malformed container", async () => {
    const res = await request(app()).post("/api/convert").send(Buffer.from("not an outlook message"));

    assert.strictEqual(res.status, 422);
    assert.strictEqual(res.body.error, "Invalid input");
    assert.strictEqual(res.body.kind, "MalformedContainer");
  });

  it("should answer 500 when rendering fails", async () => {
    const res = await request(app(new FailingEngine())).post("/api/convert").send(Buffer.from(sampleMsg()));

    assert.strictEqual(res.status, 500);
    assert.deepStrictEqual(res.body, {
      error: "Failed to convert file",
      kind: "RenderingFailed",
      details: "Rendering engine failed: layout exploded",
    });
  });
});

describe("POST /api/inspect", () => {
  it("should describe the message", async () => {
    const res = await request(app())
      .post("/api/inspect")
      .send(Buffer.from(sampleMsg({ subject: "Look", attachments: [await pdfAttachment("q1.pdf", 1)] })));

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.subject, "Look");
    assert.strictEqual(res.body.attachments.length, 1);
    assert.strictEqual(res.body.attachments[0].disposition, "merge-as-pdf");
  });

  it("should reject an empty upload", async () => {
    const res = await request(app()).post("/api/inspect");
    assert.strictEqual(res.status, 400);
  });
});

describe("POST /api/batch", () => {
  it("should convert a directory below the batch root and return the report", async () => {
    const root = await temp.create();
    await mkdir(join(root, "in"));
    await writeFile(join(root, "in", "a.msg"), sampleMsg());
    await writeFile(join(root, "in", "b.msg"), "junk");

    const res = await request(batchApp(root))
      .post("/api/batch")
      .send({ inputPath: "in", outputDirectory: "out", workers: 2 });

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.total, 2);
    assert.strictEqual(res.body.succeeded, 1);
    assert.strictEqual(res.body.failed, 1);
    assert.strictEqual(res.body.results[0].outputPath, join(root, "out", "a.pdf"));
  });

  it("should be disabled without a batch root", async () => {
    const root = await temp.create();
    const res = await request(app()).post("/api/batch").send({ inputPath: root, outputDirectory: root });

    assert.strictEqual(res.status, 403);
    assert.deepStrictEqual(res.body, { error: "Batch conversion is disabled" });
  });

  it("should reject paths that leave the batch root", async () => {
    const root = await temp.create();
    const outside = await temp.create();

    for (const paths of [
      { inputPath: "../elsewhere", outputDirectory: "out" },
      { inputPath: ".", outputDirectory: outside },
    ]) {
      const res = await request(batchApp(root)).post("/api/batch").send(paths);
      assert.strictEqual(res.status, 400);
      assert.deepStrictEqual(res.body, { error: "inputPath and outputDirectory must stay inside the batch root" });
    }
  });

  it("should reject a symlink that points outside the batch root", async () => {
    const root = await temp.create();
    const outside = await temp.create();
    await writeFile(join(outside, "secret.msg"), sampleMsg());
    await symlink(outside, join(root, "link"));

    const res = await request(batchApp(root)).post("/api/batch").send({ inputPath: "link", outputDirectory: "out" });

    assert.strictEqual(res.status, 400);
  });

  it("should require input and output paths", async () => {
    const root = await temp.create();
    const res = await request(batchApp(root)).post("/api/batch").send({ inputPath: "somewhere" });

    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(res.body, { error: "inputPath and outputDirectory are required" });
  });

  it("should answer 400 for a missing input path", async () => {
    const root = await temp.create();
    const res = await request(batchApp(root)).post("/api/batch").send({ inputPath: "missing", outputDirectory: "." });

    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.kind, "IoFailed");
  });

  it("should answer 400 for an invalid worker count", async () => {
    const root = await temp.create();
    const res = await request(batchApp(root))
      .post("/api/batch")
      .send({ inputPath: ".", outputDirectory: ".", workers: 0 });

    assert.strictEqual(res.status, 400);
    assert.strictEqual(res.body.details, "workerCount must be a positive integer, got 0");
  });
});

describe("statusFor", () => {
  it("should map failure kinds to status codes", () => {
    assert.strictEqual(statusFor(new ConversionError("MalformedContainer", "x")), 422);
    assert.strictEqual(statusFor(new ConversionError("AttachmentTooDeep", "x")), 422);
    assert.strictEqual(statusFor(new ConversionError("IoFailed", "x")), 400);
    assert.strictEqual(statusFor(new ConversionError("AssemblyFailed", "x")), 500);
    assert.strictEqual(statusFor(new RangeError("x")), 400);
    assert.strictEqual(statusFor(new Error("x")), 500);
  });
});
