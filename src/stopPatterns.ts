import fs from "node:fs";
import path from "node:path";

import { hmsToSec, streamCsv } from "./gtfsUtils.js";
import type { PatternStopRecord, StopPattern, StopPatterns } from "./types.js";

export const ROUTE_STORIES_FILE = "route_stories.txt";
export const TRIP_TO_STORIES_FILE = "trip_to_stories.txt";

function openIn(folder: string, name: string) {
    const file = path.join(folder, name);
    if (!fs.existsSync(file)) throw new Error(`missing ${name} in ${folder}`);
    return fs.createReadStream(file);
}

/**
 * Loads the route stories (canonical stop patterns) and which pattern each trip follows.
 *
 * route_stories.txt: route_story_id, arrival_offset, departure_offset, stop_id, stop_sequence, ...
 * trip_to_stories.txt: trip_id, route_story_id
 */
export async function loadStopPatterns(folder: string): Promise<StopPatterns> {
    console.log("Loading route stories");

    const records = new Map<string, PatternStopRecord[]>();
    await streamCsv(openIn(folder, ROUTE_STORIES_FILE), r => {
        const patternId = r["route_story_id"];
        if (!patternId) return;
        const arrivalOffset = hmsToSec(r["arrival_offset"]);
        const stopSequence = Number.parseInt(r["stop_sequence"] ?? "", 10);
        if (arrivalOffset === undefined || Number.isNaN(stopSequence)) {
            throw new Error(`${ROUTE_STORIES_FILE}: bad row for route story ${patternId}`);
        }
        let list = records.get(patternId);
        if (!list) {
            list = [];
            records.set(patternId, list);
        }
        list.push({ stopId: r["stop_id"] ?? "", stopSequence, arrivalOffset });
    });

    const patterns = new Map<string, StopPattern>();
    for (const [patternId, stops] of records) {
        stops.sort((a, b) => a.stopSequence - b.stopSequence);
        patterns.set(patternId, { patternId, stops });
    }

    const tripToPattern = new Map<string, string>();
    await streamCsv(openIn(folder, TRIP_TO_STORIES_FILE), r => {
        const tripId = r["trip_id"];
        const patternId = r["route_story_id"];
        if (!tripId || !patternId) return;
        tripToPattern.set(tripId, patternId);
    });

    console.log(`   There are ${patterns.size} route stories, ${tripToPattern.size} trips mapped`);
    return { patterns, tripToPattern };
}
