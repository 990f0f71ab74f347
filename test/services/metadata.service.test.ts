import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MetadataFormat } from "@/enums/output.enum.js";
import { createMetadataWriter } from "@/services/metadata.service.js";
import { PtsFileWriter } from "@/services/timestamp.service.js";

describe("auxiliary outputs", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "aux-output-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("streams json metadata as an array of objects", () => {
    const target = path.join(tmpDir, "meta.json");
    const writer = createMetadataWriter(MetadataFormat.JSON, target);

    writer.start();
    writer.write({ seq: 1, label: "car" });
    writer.write({ seq: 2 });
    writer.stop();

    const text = fs.readFileSync(target, "utf8");
    expect(text).toBe('[\n{\n    "seq": 1,\n    "label": "car"\n},\n{\n    "seq": 2\n}\n]\n');
    expect(JSON.parse(text)).toEqual([{ seq: 1, label: "car" }, { seq: 2 }]);
  });

  it("writes text metadata as key=value blocks", () => {
    const target = path.join(tmpDir, "meta.txt");
    const writer = createMetadataWriter(MetadataFormat.TXT, target);

    writer.start();
    writer.write({ seq: 1, boxes: [3, 4] });
    writer.write({ seq: 2, moving: false });
    writer.stop();

    expect(fs.readFileSync(target, "utf8")).toBe("seq=1\nboxes=[ 3, 4 ]\n\nseq=2\nmoving=false\n\n");
  });

  it("writes a v2 timecode file", () => {
    const target = path.join(tmpDir, "pts.txt");
    const writer = new PtsFileWriter(target);

    writer.write(0);
    writer.write(33_333);
    writer.close();

    expect(fs.readFileSync(target, "utf8")).toBe("# timecode format v2\n0.000\n33.333\n");
  });
});
