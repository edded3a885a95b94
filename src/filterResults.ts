import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";

import type { FilterConfig } from "./config.js";
import { STATION_ACCESS_FILE } from "./exportResults.js";
import { fileTimestamp, toCsv } from "./gtfsUtils.js";

export type FilterOptions = Omit<FilterConfig, "folder" | "outputFilename">;

export const NO_FILTER: FilterOptions = Object.freeze({
    maxTravelTime: -1,
    onlyNearestStation: false,
    minWeekdayTrips: 0,
});

type Row = Readonly<Record<string, string>>;

function int(row: Row, column: string): number {
    const n = Number.parseInt(row[column] ?? "", 10);
    if (Number.isNaN(n)) throw new Error(`${column} is not a number in row for stop ${row["stop_id"] ?? "?"}`);
    return n;
}

/**
 * Applied in this order: max travel time, include stations, exclude stations,
 * nearest station only, min weekday trips.
 *
 * Nearest only keeps one row per stop_id, the one with the smallest travel_time; when two
 * rows tie the later one wins. Rows come out in the order their stop_id first appeared.
 */
export function filterAccessRows<R extends Row>(rows: readonly R[], options: FilterOptions): R[] {
    let out = [...rows];
    const { maxTravelTime, stationsToInclude, stationsToExclude } = options;

    if (maxTravelTime !== -1) out = out.filter(r => int(r, "travel_time") <= maxTravelTime);
    if (stationsToInclude?.size) out = out.filter(r => stationsToInclude.has(r["station_id"] ?? ""));
    if (stationsToExclude?.size) out = out.filter(r => !stationsToExclude.has(r["station_id"] ?? ""));
    if (options.onlyNearestStation) {
        const nearest = new Map<string, R>();
        for (const r of out) {
            const stopId = r["stop_id"] ?? "";
            const best = nearest.get(stopId);
            if (!best || int(r, "travel_time") <= int(best, "travel_time")) nearest.set(stopId, r);
        }
        out = Array.from(nearest.values());
    }
    return out.filter(r => int(r, "weekday_trips") >= options.minWeekdayTrips);
}

export function readStationAccess(file: string): { fields: string[]; rows: Row[] } {
    const parsed = Papa.parse<Record<string, string>>(fs.readFileSync(file, "utf8"), {
        header: true,
        skipEmptyLines: true,
    });
    if (parsed.errors.length) {
        const e = parsed.errors[0];
        throw new Error(`${file}: ${e.message} (row ${e.row ?? "?"})`);
    }
    return { fields: parsed.meta.fields ?? [], rows: parsed.data };
}

function setText(ids?: ReadonlySet<string>) {
    return ids?.size ? `{${Array.from(ids).join(", ")}}` : "None";
}

export type FilterSummary = {
    inputFile: string;
    outputFile: string;
    readmeFile: string;
    originalCount: number;
    filteredCount: number;
};

export function filterStationAccessResults(config: FilterConfig, now = new Date()): FilterSummary {
    console.log("Running filter_station_access_results");
    const inputFile = path.join(config.folder, STATION_ACCESS_FILE);
    const outputFilename = config.outputFilename ?? `filtered_station_access_${fileTimestamp(now)}.txt`;

    const { fields, rows } = readStationAccess(inputFile);
    const filtered = filterAccessRows(rows, config);

    const outputFile = path.join(config.folder, outputFilename);
    fs.writeFileSync(outputFile, toCsv(fields, filtered), "utf8");

    const readmeFile = path.join(config.folder, `${path.parse(outputFilename).name}.readme.txt`);
    fs.writeFileSync(
        readmeFile,
        [
            "Results of filter_station_access_results",
            `input_file=${inputFile}`,
            `max_time_difference_from_station=${config.maxTravelTime}`,
            `stations_to_include=${setText(config.stationsToInclude)}`,
            `stations_to_exclude=${setText(config.stationsToExclude)}`,
            `only_nearest_station=${config.onlyNearestStation}`,
            `min_weekday_trips=${config.minWeekdayTrips}`,
            `Number of original records=${rows.length}`,
            `Number of records after filter=${filtered.length}`,
            "",
        ].join("\n"),
        "utf8"
    );

    console.log(`  ${rows.length} records in, ${filtered.length} out, written to ${outputFile}`);
    return { inputFile, outputFile, readmeFile, originalCount: rows.length, filteredCount: filtered.length };
}
