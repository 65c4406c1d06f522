export type SanctionsEntity = {
  id: string;
  score: number; // 0..1
  caption: string;
  schema: string | null;
  properties: {
    name: string[];
    topics: string[];
    country: string[];
  };
  datasets: string[];
};

export type SanctionsSearchOptions = {
  schema?: string;
  datasets?: string[];
  limit?: number;
};

export interface SanctionsAdapter {
  readonly name: string;
  // Zero results is a successful screening, not an error.
  search(name: string, options?: SanctionsSearchOptions): Promise<SanctionsEntity[]>;
}
