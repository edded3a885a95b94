import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
    buildAccessRows,
    formatReadme,
    writeAccessReadme,
    writeStationAccess,
    type RunSummary,
} from "./exportResults.js";
import type { StopStationAggregate } from "./stationAccess.js";
import type { Route, Stop } from "./types.js";

function stop(stopId: string, stopCode: string, stopName: string, parentStation?: string): Stop {
    return { stopId, stopCode, stopName, lat: 32.0721, lon: 34.7925, parentStation, locationType: 0 };
}

function route(routeId: string, lineNumber: string): Route {
    return { routeId, agencyId: "3", lineNumber, routeLongName: "", routeType: 3 };
}

const stops = new Map([
    ["7", stop("7", "21007", "Arlozorov/Namir", "7000")],
    ["8", stop("8", "21008", "Begin/Kaplan")],
    ["90", stop("90", "17038", "Tel Aviv Center")],
]);

function aggregate(stopId: string, routes: Route[], travelTime: number): StopStationAggregate {
    return { stopId, stationId: "90", routes, tripCounts: { weekdayTrips: 48, weekendTrips: 8 }, travelTime };
}

beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
});

describe("buildAccessRows", () => {
    it("fills every column from the aggregate and the stops", () => {
        const [row] = buildAccessRows(
            [aggregate("7", [route("r61", "61"), route("r5", "5"), route("r61b", "61")], 299.5)],
            stops
        );
        expect(row).toEqual({
            stop_id: "7",
            station_id: "90",
            stop_code: "21007",
            station_code: "17038",
            travel_time: "4",
            weekday_trips: "48",
            weekend_trips: "8",
            latitude: "32.0721",
            longitude: "34.7925",
            station_name: "Tel Aviv Center",
            line_numbers: "5 61",
            route_ids: "r61 r5 r61b",
            parent_stop: "7000",
        });
    });

    it("rounds travel time down to whole minutes, negative ones too", () => {
        const rows = buildAccessRows(
            [aggregate("8", [route("r", "1")], 59.9), aggregate("8", [route("r", "1")], -90)],
            stops
        );
        expect(rows.map(r => r.travel_time)).toEqual(["0", "-2"]);
        expect(rows[0].parent_stop).toBe("");
    });

    it("fails on a stop missing from the feed", () => {
        expect(() => buildAccessRows([aggregate("404", [route("r", "1")], 60)], stops)).toThrow(/404/);
    });
});

describe("writing results", () => {
    let folder: string;
    const summary: RunSummary = {
        executedAt: new Date("2024-03-01T10:00:00Z"),
        gtfsFolder: "feeds/2024",
        startDate: "2024-03-03",
        endDate: "2024-03-10",
        toStation: true,
        stationStopDistance: 300,
        stopsNearStations: 12,
        routesCallingAtStations: 4,
        stopStationPairs: 30,
    };

    beforeEach(() => {
        folder = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "export-")), "nested", "out");
    });

    afterEach(() => {
        fs.rmSync(path.dirname(path.dirname(folder)), { recursive: true, force: true });
    });

    it("creates the folder and writes a header plus one line per row", () => {
        const rows = buildAccessRows([aggregate("8", [route("r1", "1")], 150)], stops);
        const file = writeStationAccess(folder, rows);
        expect(fs.readFileSync(file, "utf8")).toBe(
            "stop_id,station_id,stop_code,station_code,travel_time,weekday_trips,weekend_trips," +
            "latitude,longitude,station_name,line_numbers,route_ids,parent_stop\n" +
            "8,90,21008,17038,2,48,8,32.0721,34.7925,Tel Aviv Center,1,r1,\n"
        );
    });

    it("writes only the header for an empty result", () => {
        const file = writeStationAccess(folder, []);
        expect(fs.readFileSync(file, "utf8").split("\n")).toHaveLength(2);
    });

    it("records parameters and counts in the readme", () => {
        const file = writeAccessReadme(folder, summary);
        expect(fs.readFileSync(file, "utf8")).toBe(formatReadme(summary));
        expect(formatReadme(summary).split("\n")).toEqual([
            "Results of station access finder",
            "Time of execution: 2024-03-01T10:00:00.000Z",
            "Execution parameters:",
            "  gtfs_folder: feeds/2024",
            "  start_date: 2024-03-03",
            "  end_date: 2024-03-10",
            "  direction: stop to station",
            "  bus stop is considered to be serving a train station if it's up to 300m from it (straight line)",
            "",
            "Results:",
            "  number of bus stops near stations: 12",
            "  number of bus routes calling at stations: 4",
            "  number of (stop, station) pairs: 30",
            "",
        ]);
    });
});
