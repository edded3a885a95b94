/**
 * Weekday/weekend trip tally carried by patterns, routes and (stop, station) pairs.
 * Merging is plain pairwise addition, so totals are conserved at every level.
 */
export type TripCounts = {
    readonly weekdayTrips: number;
    readonly weekendTrips: number;
};

export const NO_TRIPS: TripCounts = Object.freeze({ weekdayTrips: 0, weekendTrips: 0 });

export function addTripCounts(a: TripCounts, b: TripCounts): TripCounts {
    return {
        weekdayTrips: a.weekdayTrips + b.weekdayTrips,
        weekendTrips: a.weekendTrips + b.weekendTrips,
    };
}

export function totalTrips(counts: TripCounts): number {
    return counts.weekdayTrips + counts.weekendTrips;
}
