import JSZip from "jszip";
import { posix } from "node:path";
import {
  SUPPORTED_SPREADSHEET_EXTENSIONS,
  type ProcessingWarning,
  type RecordSource,
} from "@hppd/shared";
import { InvalidArchiveError } from "../errors";

export interface ExtractedFile {
  name: string;
  path: string;
  data: Buffer;
}

export interface ExtractionResult {
  files: ExtractedFile[];
  warnings: ProcessingWarning[];
}

export interface ExtractionLimits {
  maxFiles: number;
  maxTotalBytes: number;
}

export const DEFAULT_EXTRACTION_LIMITS: ExtractionLimits = {
  maxFiles: 500,
  maxTotalBytes: 200 * 1024 * 1024,
};

const SUPPORTED = new Set<string>(SUPPORTED_SPREADSHEET_EXTENSIONS);

function isHiddenEntry(path: string): boolean {
  const base = posix.basename(path);
  return path.startsWith("__MACOSX/") || path.includes("/__MACOSX/") || base.startsWith("._") || base === ".DS_Store";
}

function formatBytes(bytes: number): string {
  return bytes >= 1024 * 1024 ? `${Math.round(bytes / (1024 * 1024))} MB` : `${bytes} bytes`;
}

export function isSupportedSpreadsheet(name: string): boolean {
  return SUPPORTED.has(posix.extname(name).toLowerCase());
}

export class ArchiveExtractor {
  /**
   * Unpacks a zip upload into its spreadsheet files. Ineligible entries are
   * skipped with a warning; an archive with nothing usable is rejected.
   */
  static async extract(
    blob: Buffer,
    source: RecordSource,
    limits: ExtractionLimits = DEFAULT_EXTRACTION_LIMITS,
  ): Promise<ExtractionResult> {
    const label = source === "Template" ? "Template" : "Actual report";

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(blob);
    } catch (e) {
      throw new InvalidArchiveError(`${label} archive is not a valid zip file`, { cause: e });
    }

    if (zip.file("[Content_Types].xml") && zip.file("xl/workbook.xml")) {
      throw new InvalidArchiveError(
        `${label} upload is a single workbook, not an archive; compress the spreadsheets into a .zip file`,
      );
    }

    const warnings: ProcessingWarning[] = [];
    const entries: JSZip.JSZipObject[] = [];

    zip.forEach((_relativePath, entry) => {
      if (entry.dir) return;
      const path = entry.name;
      const name = posix.basename(path);

      if (isHiddenEntry(path)) {
        warnings.push({ source, file: path, category: "Hidden File", message: "macOS metadata file, skipped" });
        return;
      }
      if (!isSupportedSpreadsheet(name)) {
        warnings.push({
          source,
          file: path,
          category: "Unsupported Format",
          message: `Not a supported spreadsheet (${SUPPORTED_SPREADSHEET_EXTENSIONS.join(", ")}), skipped`,
        });
        return;
      }
      entries.push(entry);
    });

    if (entries.length === 0) {
      throw new InvalidArchiveError(
        `${label} archive contains no supported spreadsheet files (${SUPPORTED_SPREADSHEET_EXTENSIONS.join(", ")})`,
      );
    }
    if (entries.length > limits.maxFiles) {
      throw new InvalidArchiveError(
        `${label} archive contains ${entries.length} spreadsheets; the limit is ${limits.maxFiles}`,
      );
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const files: ExtractedFile[] = [];
    let remaining = limits.maxTotalBytes;
    for (const entry of entries) {
      const data = await ArchiveExtractor.inflate(entry, label, remaining, limits.maxTotalBytes);
      remaining -= data.length;
      files.push({ name: posix.basename(entry.name), path: entry.name, data });
    }

    if (warnings.length > 0) {
      console.warn(`[Extractor] ${label} archive: skipped ${warnings.length} entr${warnings.length === 1 ? "y" : "ies"}`);
    }
    console.log(`[Extractor] ${label} archive: ${files.length} spreadsheet(s) extracted`);

    return { files, warnings };
  }

  /**
   * Streams one entry out of the archive, stopping as soon as the bytes
   * inflated so far exceed what is left of the expansion budget.
   */
  private static async inflate(
    entry: JSZip.JSZipObject,
    label: string,
    budget: number,
    maxTotalBytes: number,
  ): Promise<Buffer> {
    const chunks: Buffer[] = [];
    let size = 0;
    try {
      for await (const chunk of entry.nodeStream("nodebuffer")) {
        const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
        size += buf.length;
        if (size > budget) {
          throw new InvalidArchiveError(`${label} archive expands beyond ${formatBytes(maxTotalBytes)}`);
        }
        chunks.push(buf);
      }
    } catch (e) {
      if (e instanceof InvalidArchiveError) throw e;
      throw new InvalidArchiveError(`${label} archive entry '${entry.name}' could not be decompressed`, { cause: e });
    }
    return Buffer.concat(chunks, size);
  }
}
