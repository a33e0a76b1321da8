import { DocumentModel } from '../core/document.js';
import type { Check, Finding } from '../core/types.js';
import type { FetchResponseLike } from '../scripts/lib/fetch-page.js';

export function runCheck(check: Check, html: string): Finding[] {
  return check.run(DocumentModel.parse(html));
}

export function kinds(findings: readonly Finding[]): string[] {
  return findings.map((f) => f.kind);
}

/** In-memory response for an injected fetch. */
export function fakeResponse(
  body: string | Uint8Array,
  init: { status?: number; statusText?: string; contentType?: string } = {},
): FetchResponseLike {
  const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body;
  const buffer = new ArrayBuffer(bytes.length);
  new Uint8Array(buffer).set(bytes);
  const status = init.status ?? 200;
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: init.statusText ?? 'OK',
    headers: { get: (name) => (name.toLowerCase() === 'content-type' ? init.contentType ?? null : null) },
    arrayBuffer: async () => buffer,
  };
}
