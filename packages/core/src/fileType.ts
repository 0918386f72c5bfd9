import path from "node:path";

export const supportedImageExtensions = new Set([
  ".png",
  ".jpg",
  ".jpeg",
  ".bmp",
  ".tiff",
  ".tif",
  ".gif",
  ".webp"
]);

export function isSupportedImagePath(inputPath: string): boolean {
  const ext = path.extname(inputPath).toLowerCase();
  return supportedImageExtensions.has(ext);
}

export function replaceExtension(inputPath: string, ext: string): string {
  const current = path.extname(inputPath);
  return current ? `${inputPath.slice(0, -current.length)}${ext}` : `${inputPath}${ext}`;
}
