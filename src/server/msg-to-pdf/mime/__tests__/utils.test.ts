import assert from "node:assert";
import { describe, it } from "node:test";
import {
  fileExtension,
  formatDisplayDate,
  formatFileSize,
  getMimeType,
  getRecipientType,
  mapImportance,
  normalizeContentType,
} from "../utils.js";

describe("fileExtension", () => {
  it("should return the lowercased extension", () => {
    assert.strictEqual(fileExtension("Report.PDF"), "pdf");
    assert.strictEqual(fileExtension("archive.tar.gz"), "gz");
  });

  it("should return empty string for dotfiles and names without extension", () => {
    assert.strictEqual(fileExtension(".hidden"), "");
    assert.strictEqual(fileExtension("README"), "");
    assert.strictEqual(fileExtension("trailing."), "");
  });
});

describe("getMimeType", () => {
  it("should map known extensions", () => {
    assert.strictEqual(getMimeType("photo.JPG"), "image/jpeg");
    assert.strictEqual(getMimeType("scan.tiff"), "image/tiff");
  });

  it("should default to octet-stream", () => {
    assert.strictEqual(getMimeType("data.xyz"), "application/octet-stream");
  });
});

describe("normalizeContentType", () => {
  it("should drop parameters and lowercase", () => {
    assert.strictEqual(normalizeContentType("Image/PNG; name=a.png"), "image/png");
    assert.strictEqual(normalizeContentType(undefined), "");
  });
});

describe("getRecipientType", () => {
  it("should map MAPI recipient types", () => {
    assert.strictEqual(getRecipientType(1), "to");
    assert.strictEqual(getRecipientType(2), "cc");
    assert.strictEqual(getRecipientType(3), "bcc");
    assert.strictEqual(getRecipientType(undefined), "to");
  });
});

describe("mapImportance", () => {
  it("should map PidTagImportance values", () => {
    assert.strictEqual(mapImportance(0), "low");
    assert.strictEqual(mapImportance(1), "normal");
    assert.strictEqual(mapImportance(2), "high");
    assert.strictEqual(mapImportance(7), undefined);
  });
});

describe("formatDisplayDate", () => {
  it("should format in UTC with a 12-hour clock", () => {
    assert.strictEqual(formatDisplayDate(new Date("2024-03-15T14:30:00Z")), "March 15, 2024 at 02:30 PM UTC");
    assert.strictEqual(formatDisplayDate(new Date("2024-01-01T00:05:00Z")), "January 1, 2024 at 12:05 AM UTC");
  });

  it("should return Unknown for missing dates", () => {
    assert.strictEqual(formatDisplayDate(undefined), "Unknown");
  });
});

describe("formatFileSize", () => {
  it("should use KB below one megabyte and MB above", () => {
    assert.strictEqual(formatFileSize(2048), "2.0 KB");
    assert.strictEqual(formatFileSize(3 * 1024 * 1024), "3.0 MB");
  });
});
