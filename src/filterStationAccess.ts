#!/usr/bin/env node
import "dotenv/config";

import { loadFilterConfig } from "./config.js";
import { filterStationAccessResults } from "./filterResults.js";

async function run() {
    const summary = filterStationAccessResults(loadFilterConfig(process.env));
    console.log(`Done. ${summary.filteredCount} of ${summary.originalCount} rows kept, see ${summary.readmeFile}`);
}

run().catch(err => {
    console.error("filter failed:", err);
    process.exit(1);
});
