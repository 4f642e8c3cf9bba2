import path from 'path';

export const RESPONSE_MARKER = '_response';
export const CAPTIONS_EXTENSION = '.srt';

// First occurrence only, case-sensitive.
export function stripResponseMarker(fileName: string): string {
  const index = fileName.indexOf(RESPONSE_MARKER);
  if (index < 0) return fileName;
  return fileName.slice(0, index) + fileName.slice(index + RESPONSE_MARKER.length);
}

export function replaceExtension(fileName: string, extension: string): string {
  const ext = path.extname(fileName);
  const stem = ext ? fileName.slice(0, -ext.length) : fileName;
  return `${stem}${extension}`;
}

/**
 * Maps a transcription response path to the subtitle file written beside it:
 * `talks/intro_response.json` becomes `talks/intro.srt`.
 *
 * Only the file name is rewritten; the directory part is kept verbatim, so a
 * `_response` inside a directory name survives.
 */
export function deriveOutputPath(inputPath: string): string {
  const fileName = path.basename(inputPath);
  const dirPrefix = inputPath.slice(0, inputPath.length - fileName.length);
  return dirPrefix + replaceExtension(stripResponseMarker(fileName), CAPTIONS_EXTENSION);
}
