import fs from "fs/promises";
import path from "node:path";

export const readText = async (filePath: string) => {
  return fs.readFile(filePath, "utf8");
};

export const writeText = async (filePath: string, content: string) => {
  // Ensure directory exists
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  await fs.writeFile(filePath, content, "utf8");
};

export const readJSON = async <T>(filePath: string) => {
  if (!(await fileExists(filePath))) {
    return null;
  }

  const content = await fs.readFile(filePath, "utf8");
  return JSON.parse(content) as T;
};

export const fileExists = async (filePath: string) => {
  return fs
    .stat(filePath)
    .then((stats) => stats.isFile())
    .catch(() => false);
};

export const replaceExtension = (filePath: string, extension: string) => {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
};

// movie.srt -> movie_vi.srt
export const translatedSubtitlePath = (filePath: string, language: string) => {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}_${language}${parsed.ext}`);
};
