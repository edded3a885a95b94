/**
 * The station access pipeline: which stops feed which rail stations, how long the ride is,
 * and how often it runs.
 *
 *  1. findStationStops         stops within the distance threshold of a station
 *  2. indexPatternStations     for every route story, its station stops
 *  3. projectStopsToStations   every stop of a route story matched to the next (or previous) station stop
 *  4. countPatternTrips        weekday/weekend trips per route story inside the analysis window
 *  5. linkPatternRoutes        the route each route story belongs to
 *  6. aggregateByRoute         travel time per (stop, station) per route, weighted by route story trips
 *  7. aggregateByStop          travel time per (stop, station), weighted by route trips
 *
 * Every stage returns a fresh collection and leaves its input alone.
 */

import { AggregationInvariantError, DataIntegrityError } from "./errors.js";
import { dateRange, dayOfWeek } from "./gtfsUtils.js";
import { StopStationMap } from "./stopStationMap.js";
import { addTripCounts, NO_TRIPS, totalTrips, type TripCounts } from "./tripCounts.js";
import type {
    IsoDate,
    PatternStopRecord,
    Route,
    Schedule,
    StationAndDistance,
    StopPattern,
} from "./types.js";

/** A pattern stop within reach of a station, and the station it serves. */
export type StationStop = {
    record: PatternStopRecord;
    stationId: string;
};

export type StationProjection = {
    stop: PatternStopRecord;
    station: StationStop;
    travelTime: number; // station.arrivalOffset - stop.arrivalOffset, seconds
};

export type PatternStations = {
    pattern: StopPattern;
    stationStops: readonly StationStop[];
};

export type ProjectedPattern = PatternStations & {
    projections: readonly StationProjection[];
};

export type CountedPattern = ProjectedPattern & {
    tripCounts: TripCounts;
};

export type ExtendedStopPattern = CountedPattern & {
    route?: Route;
};

export type ExtendedRoute = {
    route: Route;
    tripCounts: TripCounts;
    travelTimes: StopStationMap<number>; // weighted average, seconds
};

export type StopStationAggregate = {
    stopId: string;
    stationId: string;
    routes: readonly Route[];
    tripCounts: TripCounts;
    travelTime: number; // weighted average, seconds
};

export type ProximityOptions = {
    stationStopDistance: number;
    includeTrains: boolean;
};

export type AnalysisWindow = {
    startDate: IsoDate;
    endDate: IsoDate;
    weekendDays: ReadonlySet<number>;
};

// ------------------------------
// stage 1
// ------------------------------

export function findStationStops(
    distances: ReadonlyMap<string, StationAndDistance>,
    { stationStopDistance, includeTrains }: ProximityOptions
): Map<string, StationAndDistance> {
    console.log("Running stage 1: find station stops");
    const out = new Map<string, StationAndDistance>();
    for (const [stopId, near] of distances) {
        if (near.distance >= stationStopDistance) continue;
        // a rail stop is not "near" its own station
        if (!includeTrains && stopId === near.stationId) continue;
        out.set(stopId, near);
    }
    console.log(`  ${out.size} stops near train stations`);
    return out;
}

// ------------------------------
// stage 2
// ------------------------------

export function indexPatternStations(
    patterns: ReadonlyMap<string, StopPattern>,
    nearStations: ReadonlyMap<string, StationAndDistance>
): Map<string, PatternStations> {
    console.log("Running stage 2: route story station stops");
    const out = new Map<string, PatternStations>();
    for (const pattern of patterns.values()) {
        const stationStops: StationStop[] = [];
        for (const record of pattern.stops) {
            const near = nearStations.get(record.stopId);
            if (near) stationStops.push({ record, stationId: near.stationId });
        }
        if (stationStops.length) out.set(pattern.patternId, { pattern, stationStops });
    }
    console.log(`  ${out.size} route stories calling at train stations`);
    return out;
}

// ------------------------------
// stage 3
// ------------------------------

function projection(stop: PatternStopRecord, station: StationStop): StationProjection {
    return { stop, station, travelTime: station.record.arrivalOffset - stop.arrivalOffset };
}

/**
 * Each stop goes to the first station stop at or after it. Stops after the last
 * station stop are left out.
 */
export function projectForward({ pattern, stationStops }: PatternStations): StationProjection[] {
    const out: StationProjection[] = [];
    if (!stationStops.length) return out;
    let cursor = 0;
    for (const stop of pattern.stops) {
        if (stop.stopSequence > stationStops[cursor].record.stopSequence) {
            cursor++;
            if (cursor >= stationStops.length) break;
        }
        const station = stationStops[cursor];
        if (station.record.arrivalOffset < stop.arrivalOffset) {
            throw new DataIntegrityError(
                `route story ${pattern.patternId}: station stop ${station.record.stopId} (seq ${station.record.stopSequence}) ` +
                `arrives before stop ${stop.stopId} (seq ${stop.stopSequence}), stops are not sorted by offset`
            );
        }
        out.push(projection(stop, station));
    }
    return out;
}

/**
 * Mirror of projectForward: walks the pattern backwards, each stop goes to the last
 * station stop at or before it. Stops before the first station stop are left out.
 * Output is in the order visited (last stop first) and travel times are <= 0.
 */
export function projectBackward({ pattern, stationStops }: PatternStations): StationProjection[] {
    const out: StationProjection[] = [];
    if (!stationStops.length) return out;
    let cursor = stationStops.length - 1;
    for (let i = pattern.stops.length - 1; i >= 0; i--) {
        const stop = pattern.stops[i];
        if (stop.stopSequence < stationStops[cursor].record.stopSequence) {
            cursor--;
            if (cursor < 0) break;
        }
        const station = stationStops[cursor];
        if (station.record.arrivalOffset > stop.arrivalOffset) {
            throw new DataIntegrityError(
                `route story ${pattern.patternId}: station stop ${station.record.stopId} (seq ${station.record.stopSequence}) ` +
                `arrives after stop ${stop.stopId} (seq ${stop.stopSequence}), stops are not sorted by offset`
            );
        }
        out.push(projection(stop, station));
    }
    return out;
}

export function projectStopsToStations(
    patterns: ReadonlyMap<string, PatternStations>,
    toStation: boolean
): Map<string, ProjectedPattern> {
    console.log(`Running stage 3: ${toStation ? "stops to stations" : "stations to stops"}`);
    const project = toStation ? projectForward : projectBackward;
    const out = new Map<string, ProjectedPattern>();
    for (const [patternId, p] of patterns) {
        out.set(patternId, { ...p, projections: project(p) });
    }
    return out;
}

// ------------------------------
// stage 4
// ------------------------------

/** Weekday/weekend split of the dates in the window. */
export function windowTripCounts({ startDate, endDate, weekendDays }: AnalysisWindow): TripCounts {
    let weekdayTrips = 0;
    let weekendTrips = 0;
    for (const d of dateRange(startDate, endDate)) {
        if (weekendDays.has(dayOfWeek(d))) weekendTrips++;
        else weekdayTrips++;
    }
    return { weekdayTrips, weekendTrips };
}

/**
 * A trip whose service period overlaps the window counts once for every date in the
 * window. The service's day-of-week mask is not checked, so a trip running only on
 * some days is counted on all of them.
 */
export function countPatternTrips(
    patterns: ReadonlyMap<string, ProjectedPattern>,
    schedule: Pick<Schedule, "trips" | "services">,
    tripToPattern: ReadonlyMap<string, string>,
    window: AnalysisWindow
): Map<string, CountedPattern> {
    console.log("Running stage 4: route story frequency");
    const perTrip = windowTripCounts(window);
    const counts = new Map<string, TripCounts>();
    let noService = 0;
    let unmapped = 0;

    for (const trip of schedule.trips.values()) {
        const service = schedule.services.get(trip.serviceId);
        if (!service) {
            noService++;
            continue;
        }
        if (service.endDate < window.startDate || service.startDate > window.endDate) continue;
        const patternId = tripToPattern.get(trip.tripId);
        if (patternId === undefined) {
            unmapped++;
            continue;
        }
        if (!patterns.has(patternId)) continue;
        counts.set(patternId, addTripCounts(counts.get(patternId) ?? NO_TRIPS, perTrip));
    }

    if (noService) console.log(`  ${noService} trips skipped, unknown service`);
    if (unmapped) console.log(`  ${unmapped} trips skipped, no route story`);

    const out = new Map<string, CountedPattern>();
    for (const [patternId, p] of patterns) {
        out.set(patternId, { ...p, tripCounts: counts.get(patternId) ?? NO_TRIPS });
    }
    return out;
}

// ------------------------------
// stage 5
// ------------------------------

/** Every trip, in or out of the window, stamps its route on its route story. Last one wins. */
export function linkPatternRoutes(
    patterns: ReadonlyMap<string, CountedPattern>,
    schedule: Pick<Schedule, "trips" | "routes">,
    tripToPattern: ReadonlyMap<string, string>
): Map<string, ExtendedStopPattern> {
    console.log("Running stage 5: route story to route");
    const routeOf = new Map<string, Route>();
    for (const trip of schedule.trips.values()) {
        const patternId = tripToPattern.get(trip.tripId);
        if (patternId === undefined || !patterns.has(patternId)) continue;
        const route = schedule.routes.get(trip.routeId);
        if (route) routeOf.set(patternId, route);
    }

    const out = new Map<string, ExtendedStopPattern>();
    for (const [patternId, p] of patterns) {
        out.set(patternId, { ...p, route: routeOf.get(patternId) });
    }
    return out;
}

// ------------------------------
// stage 6
// ------------------------------

function weightedAverage(sum: number, counts: TripCounts, what: string): number {
    const total = totalTrips(counts);
    if (total <= 0) throw new AggregationInvariantError(`${what} has no trips to average over`);
    return sum / total;
}

export function aggregateByRoute(patterns: Iterable<ExtendedStopPattern>): Map<string, ExtendedRoute> {
    console.log("Running stage 6: route stops and stations");
    const acc = new Map<string, { route: Route; tripCounts: TripCounts; sums: StopStationMap<number> }>();
    let idle = 0;

    for (const p of patterns) {
        const weight = totalTrips(p.tripCounts);
        // no trips in the window or no route: nothing to weigh
        if (!p.route || weight === 0) {
            idle++;
            continue;
        }
        const route = p.route;
        let r = acc.get(route.routeId);
        if (!r) {
            r = { route, tripCounts: NO_TRIPS, sums: new StopStationMap<number>() };
            acc.set(route.routeId, r);
        }
        r.tripCounts = addTripCounts(r.tripCounts, p.tripCounts);
        for (const { stop, station, travelTime } of p.projections) {
            const key = { stopId: stop.stopId, stationId: station.stationId };
            r.sums.set(key, (r.sums.get(key) ?? 0) + weight * travelTime);
        }
    }
    if (idle) console.log(`  ${idle} route stories without trips in the window`);

    const out = new Map<string, ExtendedRoute>();
    for (const [routeId, { route, tripCounts, sums }] of acc) {
        const travelTimes = new StopStationMap<number>();
        for (const [key, sum] of sums) {
            travelTimes.set(key, weightedAverage(sum, tripCounts, `route ${routeId}`));
        }
        out.set(routeId, { route, tripCounts, travelTimes });
    }
    console.log(`  ${out.size} routes calling at stations`);
    return out;
}

// ------------------------------
// stage 7
// ------------------------------

export function aggregateByStop(routes: Iterable<ExtendedRoute>): StopStationMap<StopStationAggregate> {
    console.log("Running stage 7: aggregate by stop");
    const acc = new StopStationMap<{ routes: Route[]; tripCounts: TripCounts; sum: number }>();

    for (const r of routes) {
        const weight = totalTrips(r.tripCounts);
        for (const [key, travelTime] of r.travelTimes) {
            const s = acc.getOrCreate(key, () => ({ routes: [], tripCounts: NO_TRIPS, sum: 0 }));
            s.routes.push(r.route);
            s.tripCounts = addTripCounts(s.tripCounts, r.tripCounts);
            s.sum += weight * travelTime;
        }
    }

    const out = new StopStationMap<StopStationAggregate>();
    for (const [key, { routes: served, tripCounts, sum }] of acc) {
        out.set(key, {
            stopId: key.stopId,
            stationId: key.stationId,
            routes: served,
            tripCounts,
            travelTime: weightedAverage(sum, tripCounts, `stop ${key.stopId} to station ${key.stationId}`),
        });
    }
    console.log(`  ${out.size} (stop, station) pairs found`);
    return out;
}
