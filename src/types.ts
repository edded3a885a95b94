/**
 * Schedule entities as loaded from the GTFS feed and the route story files.
 * Everything here is read-only reference data: the pipeline never mutates it.
 */

export type IsoDate = string; // YYYY-MM-DD

export type Stop = {
    stopId: string;
    stopCode: string;
    stopName: string;
    lat: number;
    lon: number;
    parentStation?: string;
    locationType: number;
};

export type Route = {
    routeId: string;
    agencyId: string;
    lineNumber: string;     // route_short_name
    routeLongName: string;
    routeType: number;
};

export type Trip = {
    tripId: string;
    routeId: string;
    serviceId: string;
};

export type Service = {
    serviceId: string;
    days: readonly boolean[]; // indexed sunday (0) .. saturday (6)
    startDate: IsoDate;
    endDate: IsoDate;
};

export type Schedule = {
    stops: ReadonlyMap<string, Stop>;
    routes: ReadonlyMap<string, Route>;
    trips: ReadonlyMap<string, Trip>;
    services: ReadonlyMap<string, Service>;
};

export type PatternStopRecord = {
    stopId: string;
    stopSequence: number;
    arrivalOffset: number; // seconds since the pattern's first stop
};

/** A "route story": the stop sequence and timing shared by every trip that follows it. */
export type StopPattern = {
    patternId: string;
    stops: readonly PatternStopRecord[];
};

export type StopPatterns = {
    patterns: ReadonlyMap<string, StopPattern>;
    tripToPattern: ReadonlyMap<string, string>;
};

export type StationAndDistance = {
    stationId: string;
    distance: number; // meters, straight line
};
