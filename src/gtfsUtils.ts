import fs from "node:fs";
import { pipeline } from "node:stream/promises";
import fetch from "node-fetch";
import pRetry, { AbortError } from "p-retry";
import { parse } from "csv-parse";
import Papa from "papaparse";

import type { IsoDate } from "./types.js";

export type CsvRow = Record<string, string>;

// ------------------------------
// constant tables
// ------------------------------

export const DAY_NAMES = Object.freeze([
    "sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday",
] as const);

export type DayName = (typeof DAY_NAMES)[number];

export function isDayName(s: string): s is DayName {
    return (DAY_NAMES as readonly string[]).includes(s);
}

// standard GTFS route_type codes, then the extended (HVT) ranges
const ROUTE_TYPE_MODES: ReadonlyArray<readonly [number, number, string]> = Object.freeze([
    [0, 0, "tram"],
    [1, 1, "metro"],
    [2, 2, "rail"],
    [3, 3, "bus"],
    [4, 4, "water"],
    [5, 5, "cablecar"],
    [6, 6, "gondola"],
    [7, 7, "funicular"],
    [11, 11, "trolleybus"],
    [12, 12, "monorail"],
    [100, 117, "rail"],
    [200, 209, "coach"],
    [400, 405, "metro"],
    [700, 716, "bus"],
    [800, 800, "trolleybus"],
    [900, 906, "tram"],
    [1000, 1000, "water"],
    [1200, 1200, "water"],
    [1500, 1507, "taxi"],
] as const);

export function routeTypeToMode(routeType: number): string {
    const hit = ROUTE_TYPE_MODES.find(([lo, hi]) => routeType >= lo && routeType <= hi);
    return hit ? hit[2] : "unknown";
}

// ------------------------------
// times and dates
// ------------------------------

/** "HH:MM:SS" (hours may exceed 23) to seconds. */
export function hmsToSec(s?: string) {
    if (!s) return;
    const m = /^(\d+):(\d{2}):(\d{2})$/.exec(s.trim());
    if (!m) return;
    return +m[1] * 3600 + +m[2] * 60 + +m[3];
}

/** GTFS "YYYYMMDD" to "YYYY-MM-DD". */
export function gtfsDateToIso(s: string): IsoDate | undefined {
    const m = /^(\d{4})(\d{2})(\d{2})$/.exec(s.trim());
    if (!m) return;
    return `${m[1]}-${m[2]}-${m[3]}`;
}

export function isIsoDate(s: string): s is IsoDate {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(s)) return false;
    const d = new Date(`${s}T00:00:00Z`);
    return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s;
}

export function addDays(date: IsoDate, days: number): IsoDate {
    const d = new Date(`${date}T00:00:00Z`);
    d.setUTCDate(d.getUTCDate() + days);
    return d.toISOString().slice(0, 10);
}

/** Every date from start to end, both inclusive. */
export function dateRange(start: IsoDate, end: IsoDate): IsoDate[] {
    const out: IsoDate[] = [];
    for (let d = start; d <= end; d = addDays(d, 1)) out.push(d);
    return out;
}

/** 0 = sunday */
export function dayOfWeek(date: IsoDate): number {
    return new Date(`${date}T00:00:00Z`).getUTCDay();
}

/** YYYYMMDD_HHMMSS in local time, for output file names. */
export function fileTimestamp(now: Date): string {
    const p = (n: number) => String(n).padStart(2, "0");
    return `${now.getFullYear()}${p(now.getMonth() + 1)}${p(now.getDate())}_` +
        `${p(now.getHours())}${p(now.getMinutes())}${p(now.getSeconds())}`;
}

// ------------------------------
// io
// ------------------------------

// written to dest.part first so an interrupted download never looks like a cached file
export async function download(url: string, dest: string) {
    const partial = `${dest}.part`;
    await pRetry(
        async () => {
            const res = await fetch(url);
            if (res.status >= 400 && res.status < 500) {
                throw new AbortError(`download failed ${res.status} for ${url}`);
            }
            if (!res.ok || !res.body) throw new Error(`download failed ${res.status} for ${url}`);
            await pipeline(res.body, fs.createWriteStream(partial));
            fs.renameSync(partial, dest);
        },
        {
            retries: 3,
            onFailedAttempt: err => {
                console.log(`  download attempt ${err.attemptNumber} failed (${err.retriesLeft} left): ${err.message}`);
            },
        }
    );
}

// rows are handed to fn one at a time, stop_times-sized files never sit in memory whole
export async function streamCsv(
    input: NodeJS.ReadableStream,
    fn: (r: CsvRow) => void | Promise<void>
) {
    await pipeline(
        input,
        parse({ columns: true, skip_empty_lines: true, bom: true, trim: true }),
        async function (src: AsyncIterable<CsvRow>) {
            for await (const row of src) await fn(row);
        }
    );
}

/** Header line, one line per row, "\n" after each. Missing values are written empty. */
export function toCsv(fields: readonly string[], rows: ReadonlyArray<Readonly<Record<string, string>>>): string {
    const lines = [[...fields], ...rows.map(r => fields.map(f => r[f] ?? ""))];
    return Papa.unparse(lines, { newline: "\n" }) + "\n";
}
