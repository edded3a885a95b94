import fs from "node:fs";
import path from "node:path";

import { toCsv } from "./gtfsUtils.js";
import type { StopStationAggregate } from "./stationAccess.js";
import type { IsoDate, Stop } from "./types.js";

export const STATION_ACCESS_FILE = "station_access.txt";
export const README_FILE = "readme.txt";

export const ACCESS_COLUMNS = [
    "stop_id",
    "station_id",
    "stop_code",
    "station_code",
    "travel_time",
    "weekday_trips",
    "weekend_trips",
    "latitude",
    "longitude",
    "station_name",
    "line_numbers",
    "route_ids",
    "parent_stop",
] as const;

export type AccessColumn = (typeof ACCESS_COLUMNS)[number];

/** One line of station_access.txt, every value as written. */
export type AccessRow = Record<AccessColumn, string>;

export type RunSummary = {
    executedAt: Date;
    gtfsFolder: string;
    startDate: IsoDate;
    endDate: IsoDate;
    toStation: boolean;
    stationStopDistance: number;
    stopsNearStations: number;
    routesCallingAtStations: number;
    stopStationPairs: number;
};

function stopOf(stops: ReadonlyMap<string, Stop>, stopId: string): Stop {
    const stop = stops.get(stopId);
    if (!stop) throw new Error(`stop ${stopId} is not in stops.txt`);
    return stop;
}

export function buildAccessRows(
    aggregates: Iterable<StopStationAggregate>,
    stops: ReadonlyMap<string, Stop>
): AccessRow[] {
    const rows: AccessRow[] = [];
    for (const a of aggregates) {
        const stop = stopOf(stops, a.stopId);
        const station = stopOf(stops, a.stationId);
        const lineNumbers = Array.from(new Set(a.routes.map(r => r.lineNumber))).sort();
        rows.push({
            stop_id: a.stopId,
            station_id: a.stationId,
            stop_code: stop.stopCode,
            station_code: station.stopCode,
            travel_time: String(Math.floor(a.travelTime / 60)),
            weekday_trips: String(a.tripCounts.weekdayTrips),
            weekend_trips: String(a.tripCounts.weekendTrips),
            latitude: String(stop.lat),
            longitude: String(stop.lon),
            station_name: station.stopName,
            line_numbers: lineNumbers.join(" "),
            route_ids: a.routes.map(r => r.routeId).join(" "),
            parent_stop: stop.parentStation ?? "",
        });
    }
    return rows;
}

export function writeStationAccess(folder: string, rows: readonly AccessRow[]): string {
    fs.mkdirSync(folder, { recursive: true });
    const file = path.join(folder, STATION_ACCESS_FILE);
    fs.writeFileSync(file, toCsv(ACCESS_COLUMNS, rows), "utf8");
    console.log(`Wrote ${rows.length} rows to ${file}`);
    return file;
}

export function formatReadme(s: RunSummary): string {
    return [
        "Results of station access finder",
        `Time of execution: ${s.executedAt.toISOString()}`,
        "Execution parameters:",
        `  gtfs_folder: ${s.gtfsFolder}`,
        `  start_date: ${s.startDate}`,
        `  end_date: ${s.endDate}`,
        `  direction: ${s.toStation ? "stop to station" : "station to stop"}`,
        `  bus stop is considered to be serving a train station if it's up to ${s.stationStopDistance}m from it (straight line)`,
        "",
        "Results:",
        `  number of bus stops near stations: ${s.stopsNearStations}`,
        `  number of bus routes calling at stations: ${s.routesCallingAtStations}`,
        `  number of (stop, station) pairs: ${s.stopStationPairs}`,
        "",
    ].join("\n");
}

export function writeAccessReadme(folder: string, summary: RunSummary): string {
    fs.mkdirSync(folder, { recursive: true });
    const file = path.join(folder, README_FILE);
    fs.writeFileSync(file, formatReadme(summary), "utf8");
    return file;
}
