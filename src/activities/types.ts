// --- Activity catalog types ---
// Field names follow the JSON wire format served by GET /activities.

export interface ActivityDefinition {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

/** Activity name → definition, as loaded from the catalog file. */
export type CatalogDefinition = Record<string, ActivityDefinition>;

/** Snapshot of one activity with its live roster. */
export type Activity = ActivityDefinition;

export type ActivityListing = Record<string, Activity>;

export interface RegistrationResult {
  message: string;
}
