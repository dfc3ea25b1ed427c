// src/utils/calendarIntegration.ts

import { google } from 'googleapis';
import { GoogleAuth } from 'google-auth-library';
import type { EventDraft } from '../types/event.js';
import type { EventData, InsertedEvent } from '../types/calendar.js';
import { toNaiveIso } from './calendarDateTime.js';

const CALENDAR_SCOPE = 'https://www.googleapis.com/auth/calendar';

export interface CalendarSettings {
  calendarId?: string;
  timeZone: string;
  titlePrefix: string;
}

export interface InsertOverrides {
  description?: string;
}

/**
 * Anything that can store an event draft in a calendar
 */
export interface CalendarInserter {
  insert(draft: EventDraft, overrides?: InsertOverrides): Promise<InsertedEvent>;
}

/**
 * Service-account credentials for the Calendar API
 *
 * @param keyFile - Path to the service account JSON key
 */
export function createServiceAccountAuth(keyFile: string): GoogleAuth {
  return new GoogleAuth({
    keyFile,
    scopes: [CALENDAR_SCOPE],
  });
}

/**
 * Build the Calendar API request body for a draft.
 * Start and end keep their wall-clock value and carry the zone name separately.
 */
export function buildEventData(
  draft: EventDraft,
  settings: CalendarSettings,
  overrides: InsertOverrides = {}
): EventData {
  return {
    summary: `${settings.titlePrefix}${draft.title}`,
    location: draft.location,
    description: overrides.description ?? draft.description,
    start: {
      dateTime: toNaiveIso(draft.start),
      timeZone: settings.timeZone,
    },
    end: {
      dateTime: toNaiveIso(draft.end),
      timeZone: settings.timeZone,
    },
  };
}

export class GoogleCalendarInserter implements CalendarInserter {
  constructor(
    private readonly settings: CalendarSettings,
    private readonly auth: GoogleAuth
  ) {}

  /**
   * Insert a draft into the configured calendar
   *
   * @returns Created event id and its web link, when the API returns them
   * @throws Error if the calendar is not configured or the API call fails
   */
  async insert(draft: EventDraft, overrides?: InsertOverrides): Promise<InsertedEvent> {
    const { calendarId } = this.settings;
    if (!calendarId) {
      throw new Error('GOOGLE_CALENDAR_ID is not configured');
    }

    const calendar = google.calendar({ version: 'v3', auth: this.auth });

    try {
      const response = await calendar.events.insert({
        calendarId,
        requestBody: buildEventData(draft, this.settings, overrides),
      });

      return {
        eventId: response.data.id ?? undefined,
        htmlLink: response.data.htmlLink ?? undefined,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to create calendar event: ${message}`, { cause: error });
    }
  }
}
