import type { CheerioAPI } from 'cheerio';
import { loadDocument, type FormFields, type HttpMethod, type Transport } from '../httpAuth.js';

export interface RecordedCall {
  method: HttpMethod;
  path: string;
  form?: FormFields;
}

/**
 * Transport serving canned HTML per "METHOD path"; unknown pages resolve to null
 */
export class FakeTransport implements Transport {
  readonly calls: RecordedCall[] = [];
  private readonly pages = new Map<string, string>();
  private readonly files = new Map<string, Buffer>();

  page(method: HttpMethod, path: string, html: string): this {
    this.pages.set(`${method} ${path}`, html);
    return this;
  }

  file(path: string, content: Buffer): this {
    this.files.set(path, content);
    return this;
  }

  async request(method: HttpMethod, path: string, form?: FormFields): Promise<CheerioAPI | null> {
    this.calls.push(form ? { method, path, form } : { method, path });
    const html = this.pages.get(`${method} ${path}`);
    return html === undefined ? null : loadDocument(html);
  }

  async getFile(path: string): Promise<Buffer | null> {
    this.calls.push({ method: 'GET', path });
    return this.files.get(path) ?? null;
  }
}
