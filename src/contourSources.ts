import { gunzipSync, strFromU8 } from "fflate";
import { UNIT_RECT, boundsOfPoints, isFiniteRect, rectsOverlap, unionRect } from "./geometry";
import type { ContourLine, ContourSource, LoadedContours, Point, Rect } from "./types";

export const DEFAULT_MANIFEST_PATH = "assets/data/contour_sources_manifest.json";

export class ContourDatasetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ContourDatasetError";
  }
}

/** Reads bundled assets. Paths are the manifest's `asset` values. */
export interface AssetReader {
  readText(path: string): Promise<string>;
  readBytes(path: string): Promise<Uint8Array>;
}

export interface ContourSourceCacheOptions {
  reader: AssetReader;
  manifestPath?: string;
}

interface CachedContours {
  bounds: Rect;
  lines: ContourLine[];
  lineBounds: Rect[];
}

export class ContourSourceCache {
  private reader: AssetReader;
  private manifestPath: string;
  private manifestPromise: Promise<ContourSource[]> | null;
  private sources: Map<string, ContourSource>;
  private entries: Map<string, Promise<CachedContours>>;

  constructor(options: ContourSourceCacheOptions) {
    this.reader = options.reader;
    this.manifestPath = options.manifestPath ?? DEFAULT_MANIFEST_PATH;
    this.manifestPromise = null;
    this.sources = new Map();
    this.entries = new Map();
  }

  /** Never rejects: a missing or malformed manifest yields an empty list. */
  listSources(): Promise<ContourSource[]> {
    if (!this.manifestPromise) {
      this.manifestPromise = this.readManifest();
    }
    return this.manifestPromise;
  }

  getSource(sourceId: string): ContourSource | undefined {
    return this.sources.get(sourceId);
  }

  /**
   * Loads a source's geometry once and reuses it for every later call. With
   * `clipBounds`, only lines whose own bounds overlap it are returned and the
   * bounds are recomputed from those lines.
   */
  async loadSource(source: ContourSource | string, clipBounds?: Rect | null): Promise<LoadedContours> {
    const resolved = typeof source === "string" ? await this.resolveSource(source) : source;
    const cached = await this.loadAndCache(resolved);
    if (!clipBounds) {
      return { bounds: cached.bounds, lines: cached.lines };
    }
    return clipContours(cached, clipBounds);
  }

  /** Clipping is an optimization: when it keeps nothing, the full source is returned. */
  async loadSourceWithFallback(
    source: ContourSource | string,
    clipBounds?: Rect | null
  ): Promise<LoadedContours> {
    const loaded = await this.loadSource(source, clipBounds);
    if (loaded.lines.length === 0 && clipBounds) {
      return this.loadSource(source, null);
    }
    return loaded;
  }

  isCached(sourceId: string): boolean {
    return this.entries.has(sourceId);
  }

  private async resolveSource(sourceId: string): Promise<ContourSource> {
    const known = this.sources.get(sourceId);
    if (known) {
      return known;
    }
    await this.listSources();
    const listed = this.sources.get(sourceId);
    if (!listed) {
      throw new ContourDatasetError(`Unknown contour source: ${sourceId}`);
    }
    return listed;
  }

  private loadAndCache(source: ContourSource): Promise<CachedContours> {
    const hit = this.entries.get(source.id);
    if (hit) {
      return hit;
    }
    this.sources.set(source.id, source);
    const pending = this.readDataset(source.assetPath);
    this.entries.set(source.id, pending);
    pending.catch(() => {
      if (this.entries.get(source.id) === pending) {
        this.entries.delete(source.id);
      }
    });
    return pending;
  }

  private async readManifest(): Promise<ContourSource[]> {
    try {
      const raw = await this.readAssetText(this.manifestPath);
      const sources = parseManifest(JSON.parse(raw));
      for (const source of sources) {
        this.sources.set(source.id, source);
      }
      return sources;
    } catch (error) {
      console.warn("[contours] Manifest unavailable; no contour sources listed.", error);
      return [];
    }
  }

  private async readDataset(assetPath: string): Promise<CachedContours> {
    const raw = await this.readAssetText(assetPath);
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ContourDatasetError(`Contour dataset is not valid JSON: ${assetPath}`, { cause: error });
    }
    return parseDataset(json, assetPath);
  }

  private async readAssetText(path: string): Promise<string> {
    if (path.endsWith(".gz")) {
      const bytes = await this.reader.readBytes(path);
      return strFromU8(gunzipSync(bytes));
    }
    return this.reader.readText(path);
  }
}

export function parseManifest(json: unknown): ContourSource[] {
  if (!Array.isArray(json)) {
    throw new ContourDatasetError("Contour manifest must be an array.");
  }
  const sources: ContourSource[] = [];
  for (const item of json) {
    if (!isRecord(item)) {
      continue;
    }
    const id = typeof item.id === "string" ? item.id : "";
    const name = typeof item.name === "string" ? item.name : "";
    const assetPath = typeof item.asset === "string" ? item.asset : "";
    if (!id || !assetPath) {
      continue;
    }
    sources.push({ id, name, assetPath });
  }
  return sources;
}

function parseDataset(json: unknown, assetPath: string): CachedContours {
  if (!isRecord(json) || !Array.isArray(json.contours)) {
    throw new ContourDatasetError(`Contour dataset has no contours array: ${assetPath}`);
  }
  const lines: ContourLine[] = [];
  const lineBounds: Rect[] = [];
  let computed: Rect | null = null;
  for (const item of json.contours) {
    if (!isRecord(item) || typeof item.elev !== "number" || !Array.isArray(item.line)) {
      continue;
    }
    const points = parseLine(item.line);
    const bounds = boundsOfPoints(points);
    if (!bounds) {
      continue;
    }
    lines.push({ elevation: Math.trunc(item.elev), isMajor: item.major === true, points });
    lineBounds.push(bounds);
    computed = computed ? unionRect(computed, bounds) : bounds;
  }
  const declared = readBounds(json.bounds);
  if (!computed) {
    return { bounds: { ...UNIT_RECT }, lines: [], lineBounds: [] };
  }
  return { bounds: declared ?? computed, lines, lineBounds };
}

function parseLine(raw: unknown[]): Point[] {
  const points: Point[] = [];
  for (const entry of raw) {
    if (!Array.isArray(entry) || entry.length < 2) {
      continue;
    }
    const [x, y] = entry;
    if (typeof x === "number" && typeof y === "number" && Number.isFinite(x) && Number.isFinite(y)) {
      points.push({ x, y });
    }
  }
  return points;
}

function readBounds(raw: unknown): Rect | null {
  if (!Array.isArray(raw) || raw.length < 4) {
    return null;
  }
  const values = raw.slice(0, 4).filter((value): value is number => typeof value === "number");
  if (values.length < 4) {
    return null;
  }
  const [left, top, right, bottom] = values;
  const rect: Rect = { left, top, right, bottom };
  if (!isFiniteRect(rect) || right < left || bottom < top) {
    return null;
  }
  return rect;
}

function clipContours(cached: CachedContours, clipBounds: Rect): LoadedContours {
  const lines: ContourLine[] = [];
  let bounds: Rect | null = null;
  for (let i = 0; i < cached.lines.length; i += 1) {
    const lineBounds = cached.lineBounds[i];
    if (!rectsOverlap(lineBounds, clipBounds)) {
      continue;
    }
    lines.push(cached.lines[i]);
    bounds = bounds ? unionRect(bounds, lineBounds) : lineBounds;
  }
  if (!bounds) {
    return { bounds: { ...UNIT_RECT }, lines: [] };
  }
  return { bounds, lines };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
