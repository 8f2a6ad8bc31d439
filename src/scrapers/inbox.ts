/**
 * Inbox Scraper
 *
 * Portal pages used:
 * - wiadomosci/<folder>            folder listing
 * - wiadomosci/1/<folder>/<id>     one message
 * - wiadomosci/2/5, wiadomosci/5   compose + send
 * - wiadomosci                     delete confirmation
 * - ogloszenia                     announcements
 *
 * Reading operations throw the errors from ../errors.js;
 * write operations return a ConfirmationOutcome.
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import {
  AccessDeniedError,
  MalformedFieldError,
  StructureNotFoundError,
  TransportFailedError,
} from '../errors.js';
import type { FormFields, HttpMethod, Transport } from '../httpAuth.js';
import { logger } from '../logger.js';
import { mapTableValues } from '../parsers/tableMapper.js';
import type {
  Announcement,
  Attachment,
  ConfirmationOutcome,
  Message,
  MessageSummary,
  Receiver,
} from '../types.js';

const ACCESS_DENIED_MARKERS = ['Brak dostępu', 'Loguj'];
const MESSAGE_CELL = 'table.stretch.container-message td.message-folders + td';
const MESSAGE_BODY = 'div.container-message-content';
const MESSAGE_STATUS = 'td.left';
const UNREAD_STATUS = 'NIE';
const ATTACHMENT_ICONS = 'img[src*="filetype"]';
const CONFIRMATION_BANNER = 'div.green.container';
const RECEIVER_ROWS = "td.message-recipients table.message-recipients-detail tr[class*='line']";
const INBOX_ROWS = 'table.container-message table.decorated.stretch tbody tr';
const INBOX_ROW_CELLS = 5;
const UNREAD_STYLE = 'font-weight: bold;';
const MESSAGE_HREF = /\/wiadomosci\/\d+\/\d+\/(\d+)/;
const ANNOUNCEMENT_TABLES = 'div#body div.container-background table.decorated';
// Form value of the "back to" field on write actions
const PREVIOUS_PAGE = 6;

export const DEFAULT_FOLDER = 5;

function parseId(raw: string | undefined, field: string): number {
  const id = Number(raw);
  if (raw === undefined || !/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(id)) {
    throw new MalformedFieldError(field, raw ?? '');
  }
  return id;
}

/**
 * Path inside an attachment link's onclick:
 *   otworz_w_nowym_oknie("\/wiadomosci\/pobierz_zalacznik\/1\/2","o2",420,250)
 *     -> "wiadomosci/pobierz_zalacznik/1/2"
 */
export function attachmentPath(onclick: string): string {
  const quoted = onclick.split('"')[1];
  if (quoted === undefined) {
    throw new MalformedFieldError('attachment onclick', onclick);
  }
  return quoted.replace(/\\/g, '').replace(/^\/+|\/+$/g, '');
}

export function extractAttachments($: CheerioAPI, scope: Cheerio<Element>): Attachment[] {
  return scope
    .find(ATTACHMENT_ICONS)
    .toArray()
    .map((icon) => {
      const link = $(icon).parents('a').first();
      if (link.length === 0) {
        throw new StructureNotFoundError('a', 'Attachment icon is not inside a link');
      }
      return {
        name: link.text().trim(),
        path: attachmentPath(link.attr('onclick') ?? ''),
      };
    });
}

/**
 * Text of the green banner rendered after a successful write
 */
export function confirmationOf($: CheerioAPI | null, path: string): ConfirmationOutcome {
  if (!$) {
    return { ok: false, error: new TransportFailedError(path) };
  }

  const message = $(CONFIRMATION_BANNER).first().text().trim();
  if (!message) {
    return {
      ok: false,
      error: new StructureNotFoundError(CONFIRMATION_BANNER, 'No confirmation message found'),
    };
  }
  return { ok: true, message };
}

export class InboxScraper {
  constructor(private readonly transport: Transport) {}

  private async page(method: HttpMethod, path: string, form?: FormFields): Promise<CheerioAPI> {
    const $ = await this.transport.request(method, path, form);
    if (!$) {
      throw new TransportFailedError(path);
    }
    return $;
  }

  async getMessage(folderId: number, id: number): Promise<Message> {
    const url = `wiadomosci/1/${folderId}/${id}`;
    const $ = await this.page('GET', url);
    return this.parseMessage($, url, folderId, id);
  }

  parseMessage($: CheerioAPI, url: string, folderId: number, id: number): Message {
    const pageText = $.root().text();
    if (ACCESS_DENIED_MARKERS.some((marker) => pageText.includes(marker))) {
      throw new AccessDeniedError();
    }

    const cell = $(MESSAGE_CELL).first();
    if (cell.length === 0) {
      throw new StructureNotFoundError(
        MESSAGE_CELL,
        'The specified message content could not be found. Please check the page structure or URL.',
      );
    }

    const table = cell.children('table').first();
    if (table.length === 0) {
      throw new StructureNotFoundError(`${MESSAGE_CELL} > table`, 'No table found under the message content cell.');
    }

    const header = mapTableValues($, table, ['user', 'title', 'date'] as const);

    const body = cell.find(MESSAGE_BODY).first();
    if (body.length === 0) {
      throw new StructureNotFoundError(MESSAGE_BODY);
    }

    const status = cell.find(MESSAGE_STATUS).first();
    if (status.length === 0) {
      throw new StructureNotFoundError(MESSAGE_STATUS);
    }

    const message: Message = {
      title: header.get('title') ?? '',
      url,
      id,
      folder_id: folderId,
      date: header.get('date') ?? '',
      user: header.get('user') ?? '',
      content: body.text().trim(),
      html: $.html(body),
      read: !status.text().includes(UNREAD_STATUS),
      files: extractAttachments($, cell),
    };
    logger.debug('Inbox', `Parsed message ${id} with ${message.files.length} attachments`);
    return message;
  }

  async removeMessage(id: number): Promise<ConfirmationOutcome> {
    logger.info('Inbox', `Removing message ${id}`);
    const $ = await this.transport.request('POST', 'wiadomosci', {
      tak: 'Tak',
      id: 1,
      Wid: id,
      poprzednia: PREVIOUS_PAGE,
    });
    return confirmationOf($, 'wiadomosci');
  }

  /**
   * The compose page is loaded first; the portal refuses a send without it.
   * Nothing from that page is forwarded with the send.
   */
  async sendMessage(userId: number, title: string, content: string): Promise<ConfirmationOutcome> {
    logger.info('Inbox', `Sending message to user ${userId}`);
    // Compose page opens the send session; no form token is read from it
    await this.transport.request('GET', 'wiadomosci/2/5');

    const $ = await this.transport.request('POST', 'wiadomosci/5', {
      DoKogo: userId,
      temat: title,
      tresc: content,
      poprzednia: PREVIOUS_PAGE,
      wyslij: 'Wyślij',
    });
    return confirmationOf($, 'wiadomosci/5');
  }

  async listReceivers(group: string): Promise<Receiver[]> {
    const $ = await this.page('POST', 'wiadomosci/1/5', { adresat: group });

    return $(RECEIVER_ROWS)
      .toArray()
      .map((row) => {
        const $row = $(row);
        const input = $row.find('input[name="DoKogo[]"]').first();
        if (input.length === 0) {
          throw new StructureNotFoundError('input[name="DoKogo[]"]');
        }
        return {
          id: parseId(input.attr('value'), 'receiver id'),
          user: $row.find('label').first().text().trim(),
        };
      });
  }

  async listInbox(folderId: number = DEFAULT_FOLDER): Promise<MessageSummary[]> {
    const $ = await this.page('GET', `wiadomosci/${folderId}`);
    return this.parseInbox($);
  }

  parseInbox($: CheerioAPI): MessageSummary[] {
    const messages: MessageSummary[] = [];

    $(INBOX_ROWS).each((_, row) => {
      const cells = $(row).children('td');
      // An empty folder renders a single "no messages" cell
      if (cells.length < INBOX_ROW_CELLS) {
        logger.debug('Inbox', `Skipping row with ${cells.length} cells`);
        return;
      }

      const userCell = cells.eq(2);
      const titleCell = cells.eq(3);
      const href = titleCell.find('a').first().attr('href');
      if (href === undefined) {
        throw new StructureNotFoundError('a[href]', 'Message row has no link');
      }
      const match = href.match(MESSAGE_HREF);

      messages.push({
        id: parseId(match?.[1], 'message link'),
        user: userCell.text().trim(),
        title: titleCell.text().trim(),
        date: cells.eq(4).text().trim(),
        read: !(userCell.attr('style') ?? '').includes(UNREAD_STYLE),
      });
    });

    logger.info('Inbox', `Listed ${messages.length} messages`);
    return messages;
  }

  async listAnnouncements(): Promise<Announcement[]> {
    const $ = await this.page('GET', 'ogloszenia');

    return $(ANNOUNCEMENT_TABLES)
      .toArray()
      .map((table) => {
        const $table = $(table);
        const head = $table.find('thead').first();
        const cols = $table.find('td');
        if (head.length === 0 || cols.length < 4) {
          throw new StructureNotFoundError(ANNOUNCEMENT_TABLES, 'Announcement table is missing its header or cells');
        }
        return {
          title: head.text().trim(),
          user: cols.eq(1).text().trim(),
          date: cols.eq(2).text().trim(),
          content: cols.eq(3).text().trim(),
        };
      });
  }

  /**
   * Download a message attachment by the path found in Message.files
   */
  async getAttachment(path: string): Promise<Buffer> {
    const file = await this.transport.getFile(path);
    if (!file) {
      throw new TransportFailedError(path);
    }
    return file;
  }
}
