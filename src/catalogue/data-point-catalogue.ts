// src/catalogue/data-point-catalogue.ts

import { readFileSync } from 'node:fs';
import { CatalogueError } from '../errors.js';
import type {
  DataPointAccess,
  DataPointDefinition,
  DataPointEncoding,
} from '../types/aquaclean-types.js';

const DEFAULT_CATALOGUE_URL = new URL('../../data/data-points.json', import.meta.url);

const ACCESS_MODES: readonly DataPointAccess[] = ['Read', 'Write', 'ReadWrite'];
const ENCODINGS: readonly DataPointEncoding[] = [
  'Binary',
  'Boolean',
  'Enumerated',
  'Percent',
  'Counter',
  'Text',
  'TimestampUtc',
  'Signed',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAccess(value: unknown): value is DataPointAccess {
  return ACCESS_MODES.some(mode => mode === value);
}

function isEncoding(value: unknown): value is DataPointEncoding {
  return ENCODINGS.some(encoding => encoding === value);
}

function validateEntry(entry: unknown, index: number): DataPointDefinition {
  if (!isRecord(entry)) {
    throw new CatalogueError(`Entry ${index} is not an object`);
  }
  const { name, id, access, encoding, provisional } = entry;
  if (typeof name !== 'string' || name.length === 0) {
    throw new CatalogueError(`Entry ${index} has no name`);
  }
  if (typeof id !== 'number' || !Number.isInteger(id) || id < 0 || id > 0xffff) {
    throw new CatalogueError(`Data point ${name} has invalid id ${String(id)}`);
  }
  if (!isAccess(access)) {
    throw new CatalogueError(`Data point ${name} has invalid access ${String(access)}`);
  }
  if (!isEncoding(encoding)) {
    throw new CatalogueError(`Data point ${name} has invalid encoding ${String(encoding)}`);
  }
  if (provisional !== undefined && typeof provisional !== 'boolean') {
    throw new CatalogueError(`Data point ${name} has non-boolean provisional flag`);
  }
  return { name, id, access, encoding, provisional: provisional ?? false };
}

/**
 * Static table of appliance data points: id, name, access mode and encoding.
 */
export class DataPointCatalogue {
  private readonly byId: Map<number, DataPointDefinition> = new Map();
  private readonly byName: Map<string, DataPointDefinition> = new Map();

  constructor(definitions: readonly DataPointDefinition[]) {
    for (const definition of definitions) {
      if (this.byId.has(definition.id)) {
        throw new CatalogueError(`Duplicate data point id ${definition.id}`);
      }
      if (this.byName.has(definition.name)) {
        throw new CatalogueError(`Duplicate data point name ${definition.name}`);
      }
      const frozen = Object.freeze({ ...definition });
      this.byId.set(definition.id, frozen);
      this.byName.set(definition.name, frozen);
    }
  }

  /**
   * Validates parsed JSON of the form `{ dataPoints: [...] }`.
   * @throws CatalogueError
   */
  static fromJSON(json: unknown): DataPointCatalogue {
    if (!isRecord(json) || !Array.isArray(json.dataPoints)) {
      throw new CatalogueError('Catalogue must be an object with a dataPoints array');
    }
    return new DataPointCatalogue(json.dataPoints.map(validateEntry));
  }

  /**
   * Loads and validates a catalogue file.
   * @throws CatalogueError
   */
  static load(location: URL | string = DEFAULT_CATALOGUE_URL): DataPointCatalogue {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(location, 'utf8'));
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CatalogueError(`Cannot read data point catalogue ${String(location)}: ${message}`);
    }
    return DataPointCatalogue.fromJSON(parsed);
  }

  get(id: number): DataPointDefinition | undefined {
    return this.byId.get(id);
  }

  getByName(name: string): DataPointDefinition | undefined {
    return this.byName.get(name);
  }

  has(id: number): boolean {
    return this.byId.has(id);
  }

  all(): DataPointDefinition[] {
    return [...this.byId.values()].sort((a, b) => a.id - b.id);
  }

  get size(): number {
    return this.byId.size;
  }

  /** Unknown ids are treated as readable */
  isReadable(id: number): boolean {
    const definition = this.byId.get(id);
    return definition === undefined || definition.access !== 'Write';
  }

  /** Unknown ids are treated as writable */
  isWritable(id: number): boolean {
    const definition = this.byId.get(id);
    return definition === undefined || definition.access !== 'Read';
  }
}

let defaultCatalogue: DataPointCatalogue | null = null;

/**
 * Catalogue shipped in data/data-points.json, loaded on first use.
 */
export function getDefaultCatalogue(): DataPointCatalogue {
  if (!defaultCatalogue) {
    defaultCatalogue = DataPointCatalogue.load();
  }
  return defaultCatalogue;
}
