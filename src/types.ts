/**
 * Librus Scraper Type Definitions
 *
 * Text fields scraped by position use `null` when the cell was missing.
 */

import type { StructureNotFoundError, TransportFailedError } from './errors.js';

// ============ Absence Types ============

export interface AbsenceDetail {
  type: string | null;          // "Nieobecność"
  category?: string | null;     // "Nieusprawiedliwiona"; row not rendered for some absences
  date: string | null;          // "2024-03-11"
  subject: string | null;
  lesson_hour: string | null;   // "3"
  teacher: string | null;
  trip: boolean;                // "Tak" / "Nie"
  added_by: string | null;
}

export interface AbsenceEntry {
  type: string;                 // badge text: "nb", "sp", "u"
  id: number;                   // detail page id
}

export interface AbsenceDay {
  date: string;
  table: AbsenceEntry[];
  info: string[];               // last five cells of the row, in order
  semester: number | null;      // from the nearest "Okres N" row above, null before any
}

// ============ Grade Types ============

export interface Grade {
  value: string;                // "5", "4+", "np"
  info: Record<string, string>; // "Kategoria" → "Sprawdzian", ...
}

export interface SubjectGrades {
  subject: string;
  grades: Grade[];
}

export interface SemesterGrades {
  grades: Grade[];
  tempAverage: number;
  average: number;
}

// ============ Inbox Types ============

export interface Attachment {
  name: string;
  path: string;                 // "wiadomosci/pobierz_zalacznik/..."
}

export interface Message {
  title: string;
  url: string;
  id: number;
  folder_id: number;
  date: string;
  user: string;
  content: string;
  html: string;
  read: boolean;
  files: Attachment[];
}

export interface MessageSummary {
  id: number;
  user: string;
  title: string;
  date: string;
  read: boolean;
}

export interface Receiver {
  id: number;
  user: string;
}

export interface Announcement {
  title: string;
  user: string;
  date: string;
  content: string;
}

// ============ Write Outcomes ============

/**
 * Result of a write action (send, delete). A TransportFailedError means the
 * request itself failed; a StructureNotFoundError means no confirmation
 * banner was rendered.
 */
export type ConfirmationOutcome =
  | { ok: true; message: string }
  | { ok: false; error: TransportFailedError | StructureNotFoundError };
