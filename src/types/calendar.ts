// src/types/calendar.ts

/**
 * Event data structure for Google Calendar API
 * Aligned with calendar_v3.Schema$Event from googleapis
 */
export interface EventData {
  summary: string; // Event title
  description: string;
  location: string;
  start: {
    dateTime: string; // Naive local time, e.g. 2026-02-13T10:30:00
    timeZone: string; // IANA timezone (e.g., 'Europe/Rome')
  };
  end: {
    dateTime: string;
    timeZone: string;
  };
}

/**
 * Result of inserting an event
 */
export interface InsertedEvent {
  eventId?: string;
  htmlLink?: string;
}
