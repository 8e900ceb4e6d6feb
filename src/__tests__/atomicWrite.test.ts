import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { writeFileAtomic } from "../shared/atomicWrite";
import { FileSystemError } from "../shared/errors";

describe("writeFileAtomic", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "coros-write-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should write the full content and leave no temp file", async () => {
    const destination = path.join(tempDir, "activity.fit");

    await writeFileAtomic(destination, Buffer.from([1, 2, 3, 4]));

    expect([...fs.readFileSync(destination)]).toEqual([1, 2, 3, 4]);
    expect(fs.readdirSync(tempDir)).toEqual(["activity.fit"]);
  });

  it("should replace an existing file", async () => {
    const destination = path.join(tempDir, "metadata.json");
    fs.writeFileSync(destination, "old");

    await writeFileAtomic(destination, '{"fresh":true}');

    expect(fs.readFileSync(destination, "utf-8")).toBe('{"fresh":true}');
  });

  it("should create missing parent directories", async () => {
    const destination = path.join(tempDir, "nested", "deeper", "activity.tcx");

    await writeFileAtomic(destination, "<tcx/>");

    expect(fs.readFileSync(destination, "utf-8")).toBe("<tcx/>");
  });

  it("should fail with FileSystemError and keep the old content", async () => {
    const destination = path.join(tempDir, "taken");
    fs.mkdirSync(destination);
    fs.writeFileSync(path.join(destination, "inside.txt"), "keep");

    const error = await writeFileAtomic(destination, "new").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileSystemError);
    expect(error).toHaveProperty("path", destination);
    expect(fs.readFileSync(path.join(destination, "inside.txt"), "utf-8")).toBe("keep");
    expect(fs.readdirSync(tempDir)).toEqual(["taken"]);
  });
});
