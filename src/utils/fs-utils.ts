import * as path from "path";
import * as fsPromises from "fs/promises";

/**
 * Lists the files in a directory that end with the given extension,
 * sorted by file name
 * @param dirPath Directory to scan
 * @param extension Extension including the dot, e.g. ".in"
 * @returns Absolute paths of the matching files
 */
export async function listFilesWithExtension(
  dirPath: string,
  extension: string
): Promise<string[]> {
  const entries = await fsPromises.readdir(dirPath, { withFileTypes: true });

  return entries
    .filter((dirent) => dirent.isFile() && dirent.name.endsWith(extension))
    .map((dirent) => dirent.name)
    .sort()
    .map((name) => path.join(dirPath, name));
}

/**
 * Creates a directory (and its parents) if it does not exist yet
 * @param dirPath Directory to create
 * @returns The directory path
 */
export async function ensureDirectory(dirPath: string): Promise<string> {
  await fsPromises.mkdir(dirPath, { recursive: true });
  return dirPath;
}

/**
 * Reads a file and returns its content
 * @param filePath Path to the file
 * @returns File content as string
 */
export async function readFile(filePath: string): Promise<string> {
  return fsPromises.readFile(filePath, "utf-8");
}

/**
 * Writes content to a file
 * @param filePath Path to the file
 * @param content Content to write
 */
export async function writeFile(
  filePath: string,
  content: string
): Promise<void> {
  await fsPromises.writeFile(filePath, content, "utf-8");
}

/**
 * Writes a file through a temporary sibling and a rename, so readers never
 * see a half-written file
 */
export async function writeFileAtomic(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await fsPromises.writeFile(tmpPath, content, "utf-8");
  await fsPromises.rename(tmpPath, filePath);
}

/**
 * Checks if a file exists
 * @param filePath Path to the file
 * @returns True if the file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  return fsPromises
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

/**
 * Swaps the extension of a file path, e.g. test_1.in -> test_1.out
 */
export function withExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}
