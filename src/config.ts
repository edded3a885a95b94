import { ConfigError } from "./errors.js";
import { addDays, DAY_NAMES, isDayName, isIsoDate } from "./gtfsUtils.js";
import type { IsoDate } from "./types.js";

export type Env = Record<string, string | undefined>;

export type AccessConfig = Readonly<{
    gtfsFolder: string;
    gtfsZipName: string;
    gtfsUrl?: string;
    outputFolder: string;
    startDate: IsoDate;
    endDate: IsoDate;
    stationStopDistance: number; // meters
    toStation: boolean;
    includeTrains: boolean;
    weekendDays: ReadonlySet<number>; // 0 = sunday
}>;

export type FilterConfig = Readonly<{
    folder: string;
    outputFilename?: string;
    maxTravelTime: number; // minutes, -1 = off
    stationsToInclude?: ReadonlySet<string>;
    stationsToExclude?: ReadonlySet<string>;
    onlyNearestStation: boolean;
    minWeekdayTrips: number;
}>;

export const DEFAULT_OUTPUT_FOLDER = "out";
export const DEFAULT_GTFS_ZIP = "israel-public-transportation.zip";
export const DEFAULT_STATION_STOP_DISTANCE = 300;
export const DEFAULT_WINDOW_DAYS = 7;
// friday and saturday
export const DEFAULT_WEEKEND_DAYS: ReadonlySet<number> = Object.freeze(new Set([5, 6]));

function text(env: Env, name: string): string | undefined {
    const v = env[name]?.trim();
    return v ? v : undefined;
}

function required(env: Env, name: string): string {
    const v = text(env, name);
    if (v === undefined) throw new ConfigError(name, "is required");
    return v;
}

function date(name: string, value: string): IsoDate {
    if (!isIsoDate(value)) throw new ConfigError(name, `expected YYYY-MM-DD, got "${value}"`);
    return value;
}

function number(env: Env, name: string, fallback: number): number {
    const v = text(env, name);
    if (v === undefined) return fallback;
    const n = Number(v);
    if (!Number.isFinite(n)) throw new ConfigError(name, `expected a number, got "${v}"`);
    return n;
}

function flag(env: Env, name: string, fallback: boolean): boolean {
    const v = text(env, name)?.toLowerCase();
    if (v === undefined) return fallback;
    if (["1", "true", "yes"].includes(v)) return true;
    if (["0", "false", "no"].includes(v)) return false;
    throw new ConfigError(name, `expected true or false, got "${v}"`);
}

function idSet(env: Env, name: string): ReadonlySet<string> | undefined {
    const v = text(env, name);
    if (v === undefined) return;
    const ids = v.split(",").map(s => s.trim()).filter(Boolean);
    return ids.length ? new Set(ids) : undefined;
}

function weekendDays(env: Env): ReadonlySet<number> {
    const v = text(env, "WEEKEND_DAYS");
    if (v === undefined) return DEFAULT_WEEKEND_DAYS;
    const days = new Set<number>();
    for (const raw of v.split(",")) {
        const name = raw.trim().toLowerCase();
        if (!name) continue;
        if (!isDayName(name)) throw new ConfigError("WEEKEND_DAYS", `unknown day "${raw.trim()}"`);
        days.add(DAY_NAMES.indexOf(name));
    }
    return Object.freeze(days);
}

export function loadAccessConfig(env: Env): AccessConfig {
    const startDate = date("START_DATE", required(env, "START_DATE"));
    const endText = text(env, "END_DATE");
    const endDate = endText === undefined ? addDays(startDate, DEFAULT_WINDOW_DAYS) : date("END_DATE", endText);
    if (endDate < startDate) throw new ConfigError("END_DATE", `${endDate} is before START_DATE ${startDate}`);

    const stationStopDistance = number(env, "STATION_STOP_DISTANCE", DEFAULT_STATION_STOP_DISTANCE);
    if (stationStopDistance <= 0) throw new ConfigError("STATION_STOP_DISTANCE", "must be positive");

    return Object.freeze({
        gtfsFolder: required(env, "GTFS_FOLDER"),
        gtfsZipName: text(env, "GTFS_ZIP_NAME") ?? DEFAULT_GTFS_ZIP,
        gtfsUrl: text(env, "GTFS_URL"),
        outputFolder: text(env, "OUTPUT_FOLDER") ?? DEFAULT_OUTPUT_FOLDER,
        startDate,
        endDate,
        stationStopDistance,
        toStation: flag(env, "TO_STATION", true),
        includeTrains: flag(env, "INCLUDE_TRAINS", false),
        weekendDays: weekendDays(env),
    });
}

export function loadFilterConfig(env: Env): FilterConfig {
    const maxTravelTime = number(env, "FILTER_MAX_TRAVEL_TIME", -1);
    if (maxTravelTime < 0 && maxTravelTime !== -1) {
        throw new ConfigError("FILTER_MAX_TRAVEL_TIME", "must be -1 (off) or at least 0");
    }
    const minWeekdayTrips = number(env, "FILTER_MIN_WEEKDAY_TRIPS", 0);
    if (minWeekdayTrips < 0) throw new ConfigError("FILTER_MIN_WEEKDAY_TRIPS", "must be at least 0");

    return Object.freeze({
        folder: text(env, "FILTER_FOLDER") ?? text(env, "OUTPUT_FOLDER") ?? DEFAULT_OUTPUT_FOLDER,
        outputFilename: text(env, "FILTER_OUTPUT_FILENAME"),
        maxTravelTime,
        stationsToInclude: idSet(env, "FILTER_INCLUDE_STATIONS"),
        stationsToExclude: idSet(env, "FILTER_EXCLUDE_STATIONS"),
        onlyNearestStation: flag(env, "FILTER_NEAREST_ONLY", false),
        minWeekdayTrips,
    });
}
