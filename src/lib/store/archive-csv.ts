import { mkdir, open, readFile, type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { MicrodoseSession } from "../engine/types";
import { isNodeErrorWithCode } from "../errors";
import { ARCHIVE_COLUMNS, archiveRowSchema, formatZodIssues, toArchiveRow } from "../validation";
import { writeFileAtomic } from "./atomic-write";
import { withFileLock } from "./file-lock";

export const ARCHIVE_HEADER = ARCHIVE_COLUMNS.join(",");

/** A first line cut short by a crash during the archive's first write. */
export function isTornHeader(line: string): boolean {
  return line !== ARCHIVE_HEADER && ARCHIVE_HEADER.startsWith(line);
}

const NEEDS_QUOTING = /[",\r\n]/;

export function encodeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

export function encodeArchiveRow(session: MicrodoseSession): string {
  const row = toArchiveRow(session);
  return ARCHIVE_COLUMNS.map((column) => encodeCsvField(row[column])).join(",");
}

/**
 * Splits CSV text into records of raw fields. Quoted fields may hold commas,
 * doubled quotes and line breaks. Empty lines produce no record.
 */
export function parseCsvRecords(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let inQuotes = false;
  let fieldStarted = false;

  const endRecord = () => {
    if (fieldStarted || record.length > 0 || field !== "") {
      record.push(field);
      records.push(record);
    }
    record = [];
    field = "";
    fieldStarted = false;
  };

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        inQuotes = true;
        fieldStarted = true;
        break;
      case ",":
        record.push(field);
        field = "";
        fieldStarted = true;
        break;
      case "\r":
        if (text[i + 1] === "\n") {
          i++;
        }
        endRecord();
        break;
      case "\n":
        endRecord();
        break;
      default:
        field += char;
        fieldStarted = true;
    }
  }
  endRecord();

  return records;
}

/** Parses archive text by header name, skipping rows that do not validate. */
export function parseArchive(text: string, source = "archive"): MicrodoseSession[] {
  const [header, ...rows] = parseCsvRecords(text);
  if (!header) {
    return [];
  }

  let columns: readonly string[] = header;
  if (isTornHeader(header.join(","))) {
    console.warn(`[archive] ${source} has a torn header; reading rows in archive column order`);
    columns = ARCHIVE_COLUMNS;
  }

  const missing = ARCHIVE_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    console.warn(`[archive] ${source} header is missing ${missing.join(", ")}; ignoring file`);
    return [];
  }

  const sessions: MicrodoseSession[] = [];
  rows.forEach((fields, index) => {
    // Header is line 1.
    const rowNumber = index + 2;
    if (fields.length !== columns.length) {
      console.warn(
        `[archive] skipping row ${rowNumber} of ${source}: expected ${columns.length} fields, got ${fields.length}`
      );
      return;
    }

    const byName = Object.fromEntries(columns.map((name, column) => [name, fields[column]]));
    const parsed = archiveRowSchema.safeParse(byName);
    if (!parsed.success) {
      console.warn(`[archive] skipping row ${rowNumber} of ${source}: ${formatZodIssues(parsed.error)}`);
      return;
    }
    sessions.push(parsed.data);
  });

  return sessions;
}

/**
 * Appends one row per session under the archive lock, writing the header
 * first when the archive is new or empty, and fsyncs before returning. A torn
 * header left by an interrupted first write is rewritten in place.
 */
export async function appendArchiveRows(archivePath: string, sessions: MicrodoseSession[]): Promise<void> {
  if (sessions.length === 0) {
    return;
  }
  await mkdir(path.dirname(archivePath), { recursive: true });
  const body = sessions.map((session) => encodeArchiveRow(session) + "\n").join("");

  await withFileLock(archivePath, async () => {
    let tornHeader: string | null = null;
    const handle = await open(archivePath, "a+");
    try {
      const { size } = await handle.stat();
      let prefix = "";
      if (size === 0) {
        prefix = ARCHIVE_HEADER + "\n";
      } else {
        tornHeader = await readTornHeader(handle, size);
        const lastByte = Buffer.alloc(1);
        await handle.read(lastByte, 0, 1, size - 1);
        if (lastByte.toString("utf8") !== "\n") {
          prefix = "\n";
        }
      }

      if (tornHeader === null) {
        await handle.appendFile(prefix + body, "utf8");
        await handle.sync();
      }
    } finally {
      await handle.close();
    }

    if (tornHeader !== null) {
      console.warn(`[archive] repairing torn header in ${archivePath}`);
      const existing = await readFile(archivePath, "utf8");
      let rest = existing.slice(tornHeader.length);
      if (!rest.endsWith("\n")) {
        rest += "\n";
      }
      await writeFileAtomic(archivePath, ARCHIVE_HEADER + rest + body);
    }
  });
}

/** Returns the file's first line when it is a torn header, otherwise null. */
async function readTornHeader(handle: FileHandle, size: number): Promise<string | null> {
  const head = Buffer.alloc(Math.min(size, ARCHIVE_HEADER.length + 1));
  await handle.read(head, 0, head.length, 0);
  const [firstLine = ""] = head.toString("utf8").split("\n");
  return isTornHeader(firstLine) ? firstLine : null;
}

export async function readArchive(archivePath: string): Promise<MicrodoseSession[]> {
  let text: string;
  try {
    // Exclusive, not shared: proper-lockfile has no reader mode.
    text = await withFileLock(archivePath, () => readFile(archivePath, "utf8"));
  } catch (error) {
    if (isNodeErrorWithCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }
  return parseArchive(text, archivePath);
}
