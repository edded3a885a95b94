#!/usr/bin/env node
/**
 * Entry point for the station access run. Everything is configured through the
 * environment (or a .env file next to where it is started), see .env.example.
 */
import "dotenv/config";

import { loadAccessConfig } from "./config.js";
import { runStationAccess } from "./stationAccessFinder.js";

async function run() {
    const config = loadAccessConfig(process.env);
    const summary = await runStationAccess(config);
    console.log(
        `Done. stops near stations=${summary.stopsNearStations} routes=${summary.routesCallingAtStations} ` +
        `pairs=${summary.stopStationPairs}, results in ${config.outputFolder}`
    );
}

run().catch(err => {
    console.error("station access failed:", err);
    process.exit(1);
});
