import { createHash } from 'crypto';
import { rename, rm, writeFile } from 'fs/promises';
import * as path from 'path';
import { OpenDataResource, PayloadKind } from './open-data.types';

export const OPEN_DATA_BASE_URL = 'https://open.data.gov.sa';

const MAX_FILE_NAME_LENGTH = 180;
const SNIFF_BYTES = 2048;

const ZIP_MAGIC = Buffer.from([0x50, 0x4b, 0x03, 0x04]);
const OLE_MAGIC = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

const FORMAT_EXTENSIONS: Record<string, string> = {
  xlsx: '.xlsx',
  excel: '.xlsx',
  xls: '.xls',
  json: '.json',
  xml: '.xml',
  csv: '.csv',
  txt: '.txt',
  text: '.txt',
  pdf: '.pdf',
};

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  'application/json': '.json',
  'application/pdf': '.pdf',
  'application/vnd.ms-excel': '.xls',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet': '.xlsx',
  'application/xml': '.xml',
  'application/zip': '.zip',
  'text/csv': '.csv',
  'text/plain': '.txt',
  'text/xml': '.xml',
};

const KIND_EXTENSIONS: Partial<Record<PayloadKind, string>> = {
  xlsx_zip: '.xlsx',
  xls_ole: '.xls',
  json_text: '.json',
  xml_text: '.xml',
  csv_text: '.csv',
  text_plain: '.txt',
};

export function safeFileName(value: string): string {
  const cleaned = value
    .trim()
    .replace(/[/\\]/g, '_')
    .replace(/[^\p{L}\p{N}_\-.]+/gu, '_')
    .replace(/^[._]+|[._]+$/g, '');
  return cleaned.slice(0, MAX_FILE_NAME_LENGTH) || 'file';
}

export function extFromFormat(format: string | null | undefined): string {
  if (!format) return '';
  return FORMAT_EXTENSIONS[format.trim().toLowerCase()] ?? '';
}

export function extFromContentType(contentType: string | null | undefined): string {
  if (!contentType) return '';
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return CONTENT_TYPE_EXTENSIONS[mime] ?? '';
}

export function filenameFromContentDisposition(
  header: string | null | undefined,
): string | null {
  if (!header) return null;

  const encoded = /filename\*=UTF-8''([^;]+)/i.exec(header);
  if (encoded) {
    const raw = encoded[1].trim();
    try {
      return decodeURIComponent(raw);
    } catch {
      return raw;
    }
  }
  const quoted = /filename="([^"]+)"/i.exec(header);
  if (quoted) return quoted[1].trim();
  const bare = /filename=([^;]+)/i.exec(header);
  return bare ? bare[1].trim() : null;
}

/** Tells real data files apart from the WAF pages the portal serves instead. */
export function classifyPayload(
  body: Buffer,
  contentType?: string | null,
): PayloadKind {
  const head = body.subarray(0, SNIFF_BYTES);
  if (head.subarray(0, ZIP_MAGIC.length).equals(ZIP_MAGIC)) return 'xlsx_zip';
  if (head.subarray(0, OLE_MAGIC.length).equals(OLE_MAGIC)) return 'xls_ole';

  const text = head
    .toString('utf8')
    .replace(/^\uFEFF/, '')
    .trimStart()
    .toLowerCase();
  if (
    text.startsWith('<!doctype html') ||
    text.startsWith('<html') ||
    text.includes('/tspd/') ||
    text.includes('<apm_do_not_touch>')
  ) {
    return 'html_interstitial';
  }
  if (text.startsWith('{') || text.startsWith('[')) return 'json_text';
  if (text.startsWith('<?xml') || text.startsWith('<xml')) return 'xml_text';
  if (text.includes(',') && text.includes('\n')) return 'csv_text';
  if (contentType?.toLowerCase().startsWith('text/plain')) return 'text_plain';
  return 'binary_unknown';
}

/** Resolves portal-relative links and percent-encodes the path. */
export function normalizeDownloadUrl(link: string): string | null {
  const trimmed = link.trim();
  if (!trimmed) return null;

  const absolute = /^https?:\/\//i.test(trimmed)
    ? trimmed
    : `${OPEN_DATA_BASE_URL}/data/${trimmed.replace(/^\/+/, '')}`;
  try {
    const url = new URL(absolute);
    url.hash = '';
    return url.toString();
  } catch {
    return null;
  }
}

/**
 * Picks a file name in order of trust: Content-Disposition, a file-like
 * URL segment, the resource name or id plus its format, then the MIME type.
 */
export function deriveFileName(
  resource: OpenDataResource,
  link: string,
  contentDisposition: string | null,
  contentType: string | null,
): string {
  const fromHeader = filenameFromContentDisposition(contentDisposition);
  if (fromHeader) return safeFileName(fromHeader);

  const segment = lastPathSegment(link);
  if (segment.includes('.')) return safeFileName(segment);

  const formatExt = extFromFormat(resource.format);
  const base = resource.name.trim();
  if (base) return safeFileName(base.replace(/ /g, '_') + formatExt);
  if (resource.resourceId) return safeFileName(resource.resourceId + formatExt);

  const mimeExt = extFromContentType(contentType);
  return mimeExt ? `file${mimeExt}` : 'file';
}

/** Fills in a missing or `.bin` extension from the format, MIME type or payload. */
export function finalFileName(
  suggested: string,
  resource: OpenDataResource,
  contentType: string | null,
  kind: PayloadKind,
): string {
  const name = safeFileName(suggested);
  let ext = path.extname(name);
  let root = name.slice(0, name.length - ext.length);

  if (!root) {
    root = safeFileName(
      (resource.name || resource.resourceId || 'file').replace(/ /g, '_'),
    );
  }
  if (!ext || ext.toLowerCase() === '.bin') {
    ext =
      extFromFormat(resource.format) ||
      extFromContentType(contentType) ||
      KIND_EXTENSIONS[kind] ||
      ext;
  }
  return safeFileName(root + ext);
}

export function uniqueFileName(name: string, used: Set<string>): string {
  let candidate = name;
  const ext = path.extname(name);
  const root = name.slice(0, name.length - ext.length);
  for (let n = 2; used.has(candidate); n++) {
    candidate = `${root}-${n}${ext}`;
  }
  used.add(candidate);
  return candidate;
}

export type SaveOutcome =
  | { ok: true; file: string; size: number; sha256: string; kind: PayloadKind }
  | { ok: false; reason: 'html_interstitial' | 'empty' };

/** Writes through a `.part` file so a crash never leaves a half-written download. */
export async function saveDownload(
  dir: string,
  fileName: string,
  body: Buffer,
  kind: PayloadKind,
): Promise<SaveOutcome> {
  if (kind === 'html_interstitial') return { ok: false, reason: kind };
  if (body.length === 0) return { ok: false, reason: 'empty' };

  const target = path.join(dir, fileName);
  const partial = `${target}.part`;
  try {
    await writeFile(partial, body);
    await rename(partial, target);
  } catch (error) {
    await rm(partial, { force: true });
    throw error;
  }

  return {
    ok: true,
    file: fileName,
    size: body.length,
    sha256: createHash('sha256').update(body).digest('hex'),
    kind,
  };
}

function lastPathSegment(link: string): string {
  let pathname: string;
  try {
    pathname = new URL(link).pathname;
  } catch {
    return '';
  }
  const segment = pathname.split('/').pop() ?? '';
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
