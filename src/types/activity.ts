export interface ActivityDefinition {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

// Keyed by activity name, which is also the URL path segment
export type ActivityCatalog = Record<string, ActivityDefinition>;

export interface RegistryResult {
  message: string;
}
