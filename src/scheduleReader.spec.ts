import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import fetch, { Response } from "node-fetch";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
    DirectoryFeedSource,
    ensureFeedZip,
    loadSchedule,
    openFeedSource,
    ZipFeedSource,
} from "./scheduleReader.js";

vi.mock("node-fetch", async importOriginal => {
    const actual = await importOriginal<typeof import("node-fetch")>();
    return { ...actual, default: vi.fn() };
});

const FEED = fileURLToPath(new URL("../fixtures/sample-feed", import.meta.url));
const ZIP_FEED = fileURLToPath(new URL("../fixtures/zip-feed", import.meta.url));
const ZIP_NAME = "israel-public-transportation.zip";

beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
});

describe("loadSchedule", () => {
    it("reads stops, routes, trips and calendar from a folder", async () => {
        const schedule = await loadSchedule(new DirectoryFeedSource(FEED));

        expect(schedule.stops.size).toBe(7);
        expect(schedule.routes.size).toBe(3);
        expect(schedule.trips.size).toBe(7);
        expect(schedule.services.size).toBe(2);

        expect(schedule.stops.get("3")).toEqual({
            stopId: "3",
            stopCode: "103",
            stopName: "Station Square",
            lat: 32.0021,
            lon: 34.8003,
            parentStation: "300",
            locationType: 0,
        });
        expect(schedule.stops.get("1")?.parentStation).toBeUndefined();
        expect(schedule.routes.get("R900")).toEqual({
            routeId: "R900",
            agencyId: "2",
            lineNumber: "",
            routeLongName: "Central - North",
            routeType: 2,
        });
        expect(schedule.trips.get("T5")).toEqual({ tripId: "T5", routeId: "R20", serviceId: "OLD" });
        expect(schedule.services.get("OLD")).toEqual({
            serviceId: "OLD",
            days: [true, true, true, true, true, false, false],
            startDate: "2023-01-01",
            endDate: "2023-01-31",
        });
    });

    it("reads the same schedule from the zip", async () => {
        const fromFolder = await loadSchedule(new DirectoryFeedSource(FEED));
        const zip = new ZipFeedSource(path.join(ZIP_FEED, ZIP_NAME));
        try {
            expect(await loadSchedule(zip)).toEqual(fromFolder);
        } finally {
            await zip.close();
        }
    });

    it("fails on a missing file", async () => {
        const empty = fs.mkdtempSync(path.join(os.tmpdir(), "feed-"));
        try {
            await expect(loadSchedule(new DirectoryFeedSource(empty))).rejects.toThrow(/missing stops.txt/);
        } finally {
            fs.rmSync(empty, { recursive: true, force: true });
        }
    });
});

describe("openFeedSource", () => {
    it("prefers the zip when the folder has one", async () => {
        const zip = openFeedSource(ZIP_FEED, ZIP_NAME);
        expect(zip).toBeInstanceOf(ZipFeedSource);
        await zip.close();
        expect(openFeedSource(FEED, ZIP_NAME)).toBeInstanceOf(DirectoryFeedSource);
    });
});

describe("ensureFeedZip", () => {
    let folder: string;
    const mockedFetch = vi.mocked(fetch);

    beforeEach(() => {
        folder = fs.mkdtempSync(path.join(os.tmpdir(), "download-"));
        mockedFetch.mockReset();
    });

    afterEach(() => {
        fs.rmSync(folder, { recursive: true, force: true });
    });

    it("leaves an existing zip alone", async () => {
        fs.writeFileSync(path.join(folder, "feed.zip"), "cached");
        await ensureFeedZip(folder, "feed.zip", "https://example.org/feed.zip");
        expect(mockedFetch).not.toHaveBeenCalled();
        expect(fs.readFileSync(path.join(folder, "feed.zip"), "utf8")).toBe("cached");
    });

    it("does nothing without a URL", async () => {
        await ensureFeedZip(folder, "feed.zip");
        expect(mockedFetch).not.toHaveBeenCalled();
        expect(fs.existsSync(path.join(folder, "feed.zip"))).toBe(false);
    });

    it("downloads a missing zip", async () => {
        mockedFetch.mockResolvedValue(new Response("zip-bytes", { status: 200 }));
        await ensureFeedZip(folder, "feed.zip", "https://example.org/feed.zip");
        expect(mockedFetch).toHaveBeenCalledWith("https://example.org/feed.zip");
        expect(fs.readFileSync(path.join(folder, "feed.zip"), "utf8")).toBe("zip-bytes");
        expect(fs.readdirSync(folder)).toEqual(["feed.zip"]);
    });

    it("retries a server error and keeps only the finished zip", async () => {
        mockedFetch
            .mockResolvedValueOnce(new Response("busy", { status: 503 }))
            .mockResolvedValueOnce(new Response("zip-bytes", { status: 200 }));
        await ensureFeedZip(folder, "feed.zip", "https://example.org/feed.zip");
        expect(mockedFetch).toHaveBeenCalledTimes(2);
        expect(fs.readFileSync(path.join(folder, "feed.zip"), "utf8")).toBe("zip-bytes");
        expect(fs.readdirSync(folder)).toEqual(["feed.zip"]);
    });

    it("gives up at once on a client error", async () => {
        mockedFetch.mockResolvedValue(new Response("not found", { status: 404 }));
        await expect(ensureFeedZip(folder, "feed.zip", "https://example.org/feed.zip")).rejects.toThrow(/404/);
        expect(mockedFetch).toHaveBeenCalledTimes(1);
        expect(fs.existsSync(path.join(folder, "feed.zip"))).toBe(false);
    });
});
