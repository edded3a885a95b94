import fs from "node:fs";
import path from "node:path";
import StreamZip from "node-stream-zip";

import { DAY_NAMES, download, gtfsDateToIso, streamCsv } from "./gtfsUtils.js";
import type { Route, Schedule, Service, Stop, Trip } from "./types.js";

/** Where the GTFS text files come from: the published zip, or the same files unpacked. */
export interface FeedSource {
    readonly description: string;
    open(entry: string): Promise<NodeJS.ReadableStream>;
    close(): Promise<void>;
}

export class ZipFeedSource implements FeedSource {
    private readonly zip: InstanceType<typeof StreamZip.async>;

    constructor(readonly file: string) {
        this.zip = new StreamZip.async({ file });
    }

    get description() {
        return this.file;
    }

    async open(entry: string) {
        const entries = await this.zip.entries();
        // some feeds nest the files in a folder inside the zip
        const key = Object.keys(entries).find(k => path.basename(k).toLowerCase() === entry.toLowerCase());
        if (!key) throw new Error(`missing ${entry} in ${this.file}`);
        return this.zip.stream(key);
    }

    async close() {
        await this.zip.close();
    }
}

export class DirectoryFeedSource implements FeedSource {
    constructor(readonly folder: string) {}

    get description() {
        return this.folder;
    }

    async open(entry: string) {
        const file = path.join(this.folder, entry);
        if (!fs.existsSync(file)) throw new Error(`missing ${entry} in ${this.folder}`);
        return fs.createReadStream(file);
    }

    async close() {}
}

/**
 * Download the zip into the GTFS folder if it is not there yet and a URL is known.
 */
export async function ensureFeedZip(folder: string, zipName: string, url?: string) {
    const zipFile = path.join(folder, zipName);
    if (fs.existsSync(zipFile)) {
        console.log(`using existing ${zipName}`);
        return;
    }
    if (!url) return;
    fs.mkdirSync(folder, { recursive: true });
    console.log(`downloading GTFS from ${url}…`);
    await download(url, zipFile);
}

export function openFeedSource(folder: string, zipName: string): FeedSource {
    const zipFile = path.join(folder, zipName);
    return fs.existsSync(zipFile) ? new ZipFeedSource(zipFile) : new DirectoryFeedSource(folder);
}

export async function loadSchedule(source: FeedSource): Promise<Schedule> {
    console.log(`Loading schedule from ${source.description}`);

    const stops = new Map<string, Stop>();
    await streamCsv(await source.open("stops.txt"), r => {
        const stopId = r["stop_id"];
        if (!stopId) return;
        const lat = +r["stop_lat"];
        const lon = +r["stop_lon"];
        if (Number.isNaN(lat) || Number.isNaN(lon)) return;
        stops.set(stopId, {
            stopId,
            stopCode: r["stop_code"] ?? "",
            stopName: r["stop_name"] ?? "",
            lat,
            lon,
            parentStation: r["parent_station"] || undefined,
            locationType: Number(r["location_type"] || 0),
        });
    });

    const routes = new Map<string, Route>();
    await streamCsv(await source.open("routes.txt"), r => {
        const routeId = r["route_id"];
        if (!routeId) return;
        routes.set(routeId, {
            routeId,
            agencyId: r["agency_id"] ?? "",
            lineNumber: r["route_short_name"] ?? "",
            routeLongName: r["route_long_name"] ?? "",
            routeType: Number(r["route_type"]),
        });
    });

    const trips = new Map<string, Trip>();
    await streamCsv(await source.open("trips.txt"), r => {
        const tripId = r["trip_id"];
        if (!tripId) return;
        trips.set(tripId, { tripId, routeId: r["route_id"] ?? "", serviceId: r["service_id"] ?? "" });
    });

    const services = new Map<string, Service>();
    await streamCsv(await source.open("calendar.txt"), r => {
        const serviceId = r["service_id"];
        if (!serviceId) return;
        const startDate = gtfsDateToIso(r["start_date"] ?? "");
        const endDate = gtfsDateToIso(r["end_date"] ?? "");
        if (!startDate || !endDate) {
            throw new Error(`calendar.txt: bad date range for service ${serviceId}`);
        }
        services.set(serviceId, {
            serviceId,
            days: DAY_NAMES.map(day => r[day] === "1"),
            startDate,
            endDate,
        });
    });

    console.log(
        `  stops=${stops.size} routes=${routes.size} trips=${trips.size} services=${services.size}`
    );
    return { stops, routes, trips, services };
}
