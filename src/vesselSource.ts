import fs from 'fs';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { parse } from 'csv-parse/sync';
import type { VesselSourceConfig } from './config';
import { errorMessage } from './errors';
import type { VesselDetails, VesselRecord } from './types';
import { normalizeVesselId } from './vesselId';

export interface VesselSource {
  listVessels(): Promise<VesselRecord[]>;
}

/**
 * Validate, dedupe (first occurrence wins) and sort by id.
 */
export function normalizeVesselList(raw: Array<{ id: unknown; details?: VesselDetails }>): VesselRecord[] {
  const byId = new Map<string, VesselRecord>();
  let rejected = 0;
  for (const entry of raw) {
    const id = normalizeVesselId(entry.id);
    if (!id) {
      rejected += 1;
      continue;
    }
    if (!byId.has(id)) byId.set(id, entry.details ? { id, details: entry.details } : { id });
  }
  if (rejected > 0) {
    console.warn(`⚠ Skipped ${rejected} invalid IMO number(s)`);
  }
  return Array.from(byId.values()).sort((a, b) => a.id.localeCompare(b.id));
}

function str(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function num(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Vessels currently within a radius of the configured port, from the
 * Datalastic `vessel_inradius` endpoint.
 */
export class DatalasticVesselSource implements VesselSource {
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: VesselSourceConfig,
    http?: AxiosInstance,
  ) {
    this.http = http ?? axios.create({ timeout: 30000 });
  }

  async listVessels(): Promise<VesselRecord[]> {
    if (!this.config.datalasticApiKey) {
      throw new Error('DATALASTIC_API_KEY is required in api mode');
    }
    console.log(
      `🛰  Fetching vessels within ${this.config.searchRadiusKm} km of ${this.config.portLat}, ${this.config.portLon}...`,
    );

    let payload: unknown;
    try {
      const res = await this.http.get<unknown>(`${this.config.datalasticBaseUrl}/vessel_inradius`, {
        params: {
          'api-key': this.config.datalasticApiKey,
          lat: this.config.portLat,
          lon: this.config.portLon,
          radius: this.config.searchRadiusKm,
        },
      });
      payload = res.data;
    } catch (err) {
      console.warn(`⚠ Error fetching vessels: ${errorMessage(err)}`);
      return [];
    }

    if (!isRecord(payload) || !isRecord(payload.meta) || payload.meta.success !== true) {
      console.warn('⚠ Vessel API request was not successful');
      return [];
    }
    const data = isRecord(payload.data) ? payload.data : {};
    const vessels = Array.isArray(data.vessels) ? data.vessels.filter(isRecord) : [];
    const extractedAt = new Date().toISOString();

    const records = normalizeVesselList(
      vessels.map((vessel) => ({
        id: vessel.imo,
        details: {
          name: str(vessel.name, 'Unknown'),
          vesselType: str(vessel.type, 'Unknown'),
          mmsi: str(vessel.mmsi) || undefined,
          destination: str(vessel.destination) || undefined,
          lat: num(vessel.lat),
          lon: num(vessel.lon),
          speed: num(vessel.speed),
          course: num(vessel.course),
          observedAt: str(vessel.last_position_time) || undefined,
          extractedAt,
        },
      })),
    );
    console.log(`✅ Found ${records.length} vessel(s) with valid IMO numbers`);
    return records;
  }
}

/**
 * Parse a vessel CSV with an `imo` column and optional `name` and `type`.
 */
export function parseVesselCsv(content: string): VesselRecord[] {
  const rows: unknown = parse(content, {
    columns: (header: string[]) => header.map((h) => h.trim().toLowerCase()),
    skip_empty_lines: true,
    trim: true,
  });
  if (!Array.isArray(rows)) return [];
  const extractedAt = new Date().toISOString();
  return normalizeVesselList(
    rows.filter(isRecord).map((row) => ({
      id: row.imo,
      details: {
        name: str(row.name, 'Unknown') || 'Unknown',
        vesselType: str(row.type, 'Unknown') || 'Unknown',
        extractedAt,
      },
    })),
  );
}

export interface StaticVesselSourceOptions {
  ids?: string[];
  csvPath?: string;
}

/**
 * Vessels named on the command line and/or in a CSV file.
 */
export class StaticVesselSource implements VesselSource {
  constructor(private readonly options: StaticVesselSourceOptions) {}

  async listVessels(): Promise<VesselRecord[]> {
    const entries: Array<{ id: unknown; details?: VesselDetails }> = [];
    if (this.options.csvPath) {
      const content = await fs.promises.readFile(this.options.csvPath, 'utf-8');
      entries.push(...parseVesselCsv(content));
    }
    for (const id of this.options.ids ?? []) {
      entries.push({ id });
    }
    if (entries.length === 0) {
      throw new Error('Static mode needs --imo or --csv');
    }
    return normalizeVesselList(entries);
  }
}

export function createVesselSource(config: VesselSourceConfig, options: StaticVesselSourceOptions = {}): VesselSource {
  return config.mode === 'api' ? new DatalasticVesselSource(config) : new StaticVesselSource(options);
}
