import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import {
  fileExists,
  readText,
  replaceExtension,
  translatedSubtitlePath,
  writeText,
} from "./file";

describe("file utils", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "wordcue-file-test-"));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("replaces the extension", () => {
    expect(replaceExtension("/media/talk.final.mp3", ".txt")).toBe("/media/talk.final.txt");
    expect(replaceExtension("clip.mp4", ".srt")).toBe("clip.srt");
  });

  it("builds the translated subtitle path", () => {
    expect(translatedSubtitlePath("/subs/movie.srt", "vi")).toBe("/subs/movie_vi.srt");
  });

  it("writes text into missing directories and reads it back", async () => {
    const filePath = path.join(tempDir, "nested", "out.txt");

    await writeText(filePath, "Xin chào\n");

    expect(await readText(filePath)).toBe("Xin chào\n");
    expect(await fileExists(filePath)).toBe(true);
  });

  it("does not treat directories or absent paths as files", async () => {
    expect(await fileExists(tempDir)).toBe(false);
    expect(await fileExists(path.join(tempDir, "absent.srt"))).toBe(false);
  });
});
