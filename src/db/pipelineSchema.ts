import type { Pool } from 'pg';

const PIPELINE_SCHEMA_SQL = `
CREATE SCHEMA IF NOT EXISTS pipeline;

CREATE TABLE IF NOT EXISTS pipeline.companies (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  name_normalized TEXT NOT NULL,
  domain TEXT,
  state TEXT,
  timezone TEXT NOT NULL DEFAULT 'central',
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
DROP INDEX IF EXISTS pipeline.companies_name_normalized_idx;
CREATE UNIQUE INDEX IF NOT EXISTS companies_name_normalized_key ON pipeline.companies (name_normalized);

CREATE TABLE IF NOT EXISTS pipeline.prospects (
  id TEXT PRIMARY KEY,
  company_id TEXT NOT NULL REFERENCES pipeline.companies (id),
  first_name TEXT NOT NULL DEFAULT '',
  last_name TEXT NOT NULL DEFAULT '',
  title TEXT,
  population TEXT NOT NULL,
  engagement_stage TEXT,
  follow_up_date TIMESTAMPTZ,
  last_contact_date TIMESTAMPTZ,
  parked_month TEXT,
  attempt_count INTEGER NOT NULL DEFAULT 0 CHECK (attempt_count >= 0),
  source TEXT,
  referred_by_prospect_id TEXT REFERENCES pipeline.prospects (id),
  dead_reason TEXT,
  dead_date TIMESTAMPTZ,
  lost_reason TEXT,
  lost_date TIMESTAMPTZ,
  close_date TIMESTAMPTZ,
  notes TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  CONSTRAINT prospects_engaged_follow_up CHECK (population <> 'engaged' OR follow_up_date IS NOT NULL),
  CONSTRAINT prospects_parked_month CHECK (population <> 'parked' OR parked_month IS NOT NULL),
  CONSTRAINT prospects_stage_only_engaged CHECK (population = 'engaged' OR engagement_stage IS NULL)
);
CREATE INDEX IF NOT EXISTS prospects_company_idx ON pipeline.prospects (company_id);
CREATE INDEX IF NOT EXISTS prospects_population_follow_up_idx ON pipeline.prospects (population, follow_up_date);

CREATE TABLE IF NOT EXISTS pipeline.contact_methods (
  id TEXT PRIMARY KEY,
  prospect_id TEXT NOT NULL REFERENCES pipeline.prospects (id),
  type TEXT NOT NULL,
  value TEXT NOT NULL,
  normalized_value TEXT NOT NULL,
  is_primary BOOLEAN NOT NULL DEFAULT FALSE,
  is_verified BOOLEAN NOT NULL DEFAULT FALSE,
  is_suspect BOOLEAN NOT NULL DEFAULT FALSE,
  confidence_score INTEGER NOT NULL DEFAULT 0,
  source TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS contact_methods_lookup_idx ON pipeline.contact_methods (type, normalized_value);
CREATE INDEX IF NOT EXISTS contact_methods_prospect_idx ON pipeline.contact_methods (prospect_id);

CREATE TABLE IF NOT EXISTS pipeline.activities (
  id TEXT PRIMARY KEY,
  prospect_id TEXT NOT NULL REFERENCES pipeline.prospects (id),
  activity_type TEXT NOT NULL,
  outcome TEXT,
  population_before TEXT,
  population_after TEXT,
  stage_before TEXT,
  stage_after TEXT,
  follow_up_set TIMESTAMPTZ,
  notes TEXT,
  created_by TEXT NOT NULL DEFAULT 'user',
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS activities_prospect_idx ON pipeline.activities (prospect_id, created_at);

CREATE TABLE IF NOT EXISTS pipeline.import_sources (
  id TEXT PRIMARY KEY,
  source_name TEXT NOT NULL,
  filename TEXT,
  total_records INTEGER NOT NULL DEFAULT 0,
  imported_records INTEGER NOT NULL DEFAULT 0,
  duplicate_records INTEGER NOT NULL DEFAULT 0,
  broken_records INTEGER NOT NULL DEFAULT 0,
  dnc_blocked_records INTEGER NOT NULL DEFAULT 0,
  imported_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

export const ensurePipelineSchema = async (pool: Pool) => {
  await pool.query(PIPELINE_SCHEMA_SQL);
};
