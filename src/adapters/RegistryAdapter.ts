import type { CompanyStatus, SbiCode } from "../domain/types.js";

export type RegistrySearchHit = {
  id: string;
  name: string;
  status: CompanyStatus;
  address: string | null;
  legalForm: string | null;
};

export type RegistryProfile = RegistrySearchHit & {
  vatNumber: string | null;
  tradeNames: string[];
  sbiCodes: SbiCode[];
  foundedOn: string | null; // ISO date
};

export type RegistrySearchFilters = {
  city?: string;
  limit?: number;
};

/**
 * One national company registry. Implementations map the vendor's JSON onto
 * these shapes and throw the errors from ./errors.ts; they never retry.
 */
export interface RegistryAdapter {
  readonly name: string;
  search(name: string, filters?: RegistrySearchFilters): Promise<RegistrySearchHit[]>;
  // Throws NotFoundError when the id is unknown.
  getProfileById(id: string): Promise<RegistryProfile>;
}
