import type { HttpRequest } from '../request/HttpRequest.mts';

export interface FileSummary {
  field: string;
  filename: string;
  contentType: string | null;
  size: number;
  storage: 'memory' | 'temporary';
}

export interface RequestSummary {
  method: string;
  scheme: string;
  host: string;
  port: number | null;
  path: string;
  query: Record<string, string[]>;
  headers: Record<string, string[]>;
  cookies: Record<string, string>;
  fields: Record<string, string[]>;
  files: FileSummary[];
  stopped: boolean;
}

export const summariseRequest = (req: HttpRequest): RequestSummary => ({
  method: req.method,
  scheme: req.scheme,
  host: req.host,
  port: req.port ?? null,
  path: req.path,
  query: req.query.toObject(),
  headers: req.headers.toObject(),
  cookies: Object.fromEntries(req.cookies),
  fields: req.post.toObject(),
  files: req.files.values().map((file) => ({
    field: file.fieldName,
    filename: file.filename,
    contentType: file.contentType ?? null,
    size: file.size,
    storage: file.storage,
  })),
  stopped: req.stopped,
});
