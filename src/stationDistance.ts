import fs from "node:fs";
import path from "node:path";

import { routeTypeToMode, streamCsv, toCsv } from "./gtfsUtils.js";
import type { Schedule, StationAndDistance, Stop, StopPatterns } from "./types.js";

export const STATION_DISTANCE_FILE = "train_station_distance.txt";

const EARTH_RADIUS_M = 6371000;

export function distanceMeters(a: Pick<Stop, "lat" | "lon">, b: Pick<Stop, "lat" | "lon">): number {
    const rad = Math.PI / 180;
    const dLat = (b.lat - a.lat) * rad;
    const dLon = (b.lon - a.lon) * rad;
    const h = Math.sin(dLat / 2) ** 2 +
        Math.cos(a.lat * rad) * Math.cos(b.lat * rad) * Math.sin(dLon / 2) ** 2;
    return 2 * EARTH_RADIUS_M * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/** Stops called at by any pattern that a rail trip follows. */
export function findRailStations(schedule: Schedule, stopPatterns: StopPatterns): Stop[] {
    const railPatterns = new Set<string>();
    for (const trip of schedule.trips.values()) {
        const route = schedule.routes.get(trip.routeId);
        if (!route || routeTypeToMode(route.routeType) !== "rail") continue;
        const patternId = stopPatterns.tripToPattern.get(trip.tripId);
        if (patternId) railPatterns.add(patternId);
    }

    const stations = new Map<string, Stop>();
    for (const patternId of railPatterns) {
        for (const record of stopPatterns.patterns.get(patternId)?.stops ?? []) {
            const stop = schedule.stops.get(record.stopId);
            if (stop) stations.set(stop.stopId, stop);
        }
    }
    return Array.from(stations.values());
}

/**
 * Nearest rail station for every stop in the feed, straight line, whole meters.
 * A station is its own nearest station at distance 0.
 */
export function computeStationDistances(
    schedule: Schedule,
    stopPatterns: StopPatterns
): Map<string, StationAndDistance> {
    const stations = findRailStations(schedule, stopPatterns);
    console.log(`  computing distances to ${stations.length} rail stations`);

    const out = new Map<string, StationAndDistance>();
    if (!stations.length) return out;
    for (const stop of schedule.stops.values()) {
        let best: StationAndDistance | undefined;
        for (const station of stations) {
            const d = distanceMeters(stop, station);
            if (!best || d < best.distance) best = { stationId: station.stopId, distance: d };
        }
        if (best) out.set(stop.stopId, { stationId: best.stationId, distance: Math.round(best.distance) });
    }
    return out;
}

export async function loadStationDistances(folder: string): Promise<Map<string, StationAndDistance> | undefined> {
    const file = path.join(folder, STATION_DISTANCE_FILE);
    if (!fs.existsSync(file)) return;

    const out = new Map<string, StationAndDistance>();
    await streamCsv(fs.createReadStream(file), r => {
        const stopId = r["stop_id"];
        const stationId = r["station_id"];
        const distance = Number(r["distance"]);
        if (!stopId || !stationId || Number.isNaN(distance)) {
            throw new Error(`${STATION_DISTANCE_FILE}: bad row for stop ${stopId ?? "?"}`);
        }
        out.set(stopId, { stationId, distance });
    });
    return out;
}

export function writeStationDistances(folder: string, distances: ReadonlyMap<string, StationAndDistance>) {
    const rows = Array.from(distances, ([stopId, d]) => ({
        stop_id: stopId,
        station_id: d.stationId,
        distance: String(d.distance),
    }));
    const file = path.join(folder, STATION_DISTANCE_FILE);
    // same .part then rename as download, a half written table is never picked up as a cache
    const partial = `${file}.part`;
    fs.writeFileSync(partial, toCsv(["stop_id", "station_id", "distance"], rows), "utf8");
    fs.renameSync(partial, file);
}

export type ResolvedStationDistances = {
    distances: Map<string, StationAndDistance>;
    computed: boolean;
};

/**
 * The precomputed table when the feed folder has a non-empty one; otherwise computed
 * from the schedule. Nothing is written here, see cacheStationDistances.
 */
export async function resolveStationDistances(
    folder: string,
    schedule: Schedule,
    stopPatterns: StopPatterns
): Promise<ResolvedStationDistances> {
    const loaded = await loadStationDistances(folder);
    if (loaded?.size) {
        console.log(`using existing ${STATION_DISTANCE_FILE} (${loaded.size} stops)`);
        return { distances: loaded, computed: false };
    }
    console.log(`${loaded ? "empty" : "no"} ${STATION_DISTANCE_FILE}, computing it from the schedule`);
    return { distances: computeStationDistances(schedule, stopPatterns), computed: true };
}

/** Writes a computed table next to the feed. An empty table is not cached. */
export function cacheStationDistances(folder: string, distances: ReadonlyMap<string, StationAndDistance>): boolean {
    if (!distances.size) {
        console.log(`  no rail stations in the schedule, ${STATION_DISTANCE_FILE} not written`);
        return false;
    }
    writeStationDistances(folder, distances);
    console.log(`  cached ${distances.size} stop distances in ${path.join(folder, STATION_DISTANCE_FILE)}`);
    return true;
}
