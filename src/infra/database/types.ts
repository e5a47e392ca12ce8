import type { ColumnType } from 'kysely';

// PostgreSQL returns Date, SQLite returns the stored ISO string
export type Timestamp = ColumnType<Date | string, Date | string, never>;

// Short URLs Table
export interface ShortUrls {
  short_code: string;
  original_url: string;
  created_at: Timestamp;
  click_count: ColumnType<number, number | undefined, number>;
}

// Database Schema Interface
export interface ShortenerDatabase {
  short_urls: ShortUrls;
}
