export type CountryCode = string;

export type CompanyStatus = "unknown" | "active" | "inactive" | "dissolved";

export type SbiCode = {
  code: string;
  description: string | null;
  primary: boolean;
};

export type CompanyProfile = {
  name: string | null;
  country: CountryCode;
  registrationNumber: string | null;
  vatNumber: string | null;
  status: CompanyStatus;
  registeredAddress: string | null;
  legalForm: string | null;
  sbiCodes: SbiCode[];
};

export type SanctionsMatchDetails = {
  schema: string | null;
  topics: string[];
  countries: string[];
  datasets: string[];
};

export type SanctionsMatch = {
  source: string;
  entityId: string;
  confidence: number; // 0..1
  matchedName: string;
  raw: SanctionsMatchDetails;
};

export type SanctionsSection = {
  hitsCount: number;
  matches: SanctionsMatch[];
};

export type RiskResult = {
  score: number;
  reasons: string[];
  provenance: Record<string, unknown>;
};

export type RiskLevel = "low" | "medium" | "high" | "critical";

export type SanctionsScreening = {
  query: string;
  totalMatches: number;
  matches: SanctionsMatch[];
  riskScore: RiskResult;
  riskLevel: RiskLevel;
  checkedAt: string; // ISO-8601
};

export type BasicChecks = {
  vatValid: boolean | null;
  regVerified: boolean;
  lastDataPull: string; // ISO-8601
};

export type ErrorKind = "not_found" | "rate_limited" | "upstream" | "timeout";

export type OutcomeSummary = Record<string, boolean | number | ErrorKind | null>;

export type AuditRecord = {
  sources: string[];
  rawCalls: Record<string, OutcomeSummary>;
};

export type Section = "registry" | "sanctions";

export type ProfileResult = {
  company: CompanyProfile;
  basicChecks: BasicChecks;
  sanctions: SanctionsSection;
  riskScore: RiskResult;
  audit: AuditRecord;
  degraded: Section[];
};

export function emptyProfile(country: CountryCode): CompanyProfile {
  return {
    name: null,
    country,
    registrationNumber: null,
    vatNumber: null,
    status: "unknown",
    registeredAddress: null,
    legalForm: null,
    sbiCodes: []
  };
}

export function emptySanctions(): SanctionsSection {
  return { hitsCount: 0, matches: [] };
}
