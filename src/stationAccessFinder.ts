import type { AccessConfig } from "./config.js";
import { buildAccessRows, writeAccessReadme, writeStationAccess, type RunSummary } from "./exportResults.js";
import { ensureFeedZip, loadSchedule, openFeedSource } from "./scheduleReader.js";
import {
    aggregateByRoute,
    aggregateByStop,
    countPatternTrips,
    findStationStops,
    indexPatternStations,
    linkPatternRoutes,
    projectStopsToStations,
} from "./stationAccess.js";
import { cacheStationDistances, resolveStationDistances } from "./stationDistance.js";
import { loadStopPatterns } from "./stopPatterns.js";
import type { Schedule, StationAndDistance, StopPatterns } from "./types.js";

export type StationAccessInputs = {
    schedule: Schedule;
    stopPatterns: StopPatterns;
    distances: ReadonlyMap<string, StationAndDistance>;
};

export type LoadedStationAccessInputs = StationAccessInputs & {
    distancesComputed: boolean;
};

export async function loadStationAccessInputs(config: AccessConfig): Promise<LoadedStationAccessInputs> {
    await ensureFeedZip(config.gtfsFolder, config.gtfsZipName, config.gtfsUrl);
    const source = openFeedSource(config.gtfsFolder, config.gtfsZipName);
    const schedule = await loadSchedule(source).finally(() => source.close());
    const stopPatterns = await loadStopPatterns(config.gtfsFolder);
    const { distances, computed } = await resolveStationDistances(config.gtfsFolder, schedule, stopPatterns);
    return { schedule, stopPatterns, distances, distancesComputed: computed };
}

/**
 * Stages 1-7 and the export. Nothing is written unless every stage succeeds.
 */
export function runStationAccessPipeline(
    config: AccessConfig,
    { schedule, stopPatterns, distances }: StationAccessInputs,
    now = new Date()
): RunSummary {
    const nearStations = findStationStops(distances, config);
    const indexed = indexPatternStations(stopPatterns.patterns, nearStations);
    const projected = projectStopsToStations(indexed, config.toStation);
    const counted = countPatternTrips(projected, schedule, stopPatterns.tripToPattern, config);
    const linked = linkPatternRoutes(counted, schedule, stopPatterns.tripToPattern);
    const routes = aggregateByRoute(linked.values());
    const stopStations = aggregateByStop(routes.values());

    console.log("Running export");
    const rows = buildAccessRows(stopStations.values(), schedule.stops);
    const summary: RunSummary = {
        executedAt: now,
        gtfsFolder: config.gtfsFolder,
        startDate: config.startDate,
        endDate: config.endDate,
        toStation: config.toStation,
        stationStopDistance: config.stationStopDistance,
        stopsNearStations: nearStations.size,
        routesCallingAtStations: routes.size,
        stopStationPairs: stopStations.size,
    };
    writeStationAccess(config.outputFolder, rows);
    writeAccessReadme(config.outputFolder, summary);
    return summary;
}

export async function runStationAccess(config: AccessConfig): Promise<RunSummary> {
    console.log(`\n=== Station access ${config.startDate} .. ${config.endDate} ===`);
    const inputs = await loadStationAccessInputs(config);
    const summary = runStationAccessPipeline(config, inputs);
    // only a run that got through every stage leaves a distance table in the feed folder
    if (inputs.distancesComputed) cacheStationDistances(config.gtfsFolder, inputs.distances);
    return summary;
}
