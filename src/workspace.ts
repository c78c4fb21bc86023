import { LayerStore } from "./layerStore";
import { ContourSourceCache } from "./contourSources";
import { parseTrack, type ParseTrackOptions } from "./gpx";
import { ViewportProjector, fitToBounds, type ViewTransform } from "./viewport";
import type { ViewportSettings } from "./settings";
import type { ContourSource, Size } from "./types";

export interface WorkspaceStatus {
  message: string | null;
  loadingSources: boolean;
  loadingContour: boolean;
  importingTrack: boolean;
}

type StatusListener = (status: WorkspaceStatus) => void;

export interface WorkspaceOptions {
  cache: ContourSourceCache;
  store?: LayerStore;
  track?: ParseTrackOptions;
  viewport?: Partial<ViewportSettings>;
}

export type TrackContent = string | Uint8Array | Promise<string | Uint8Array>;

/**
 * Runs imports against the store and reports progress as status text.
 * Work that finishes after `dispose` or after a newer request of the same
 * kind is dropped instead of applied.
 */
export class Workspace {
  readonly store: LayerStore;
  readonly cache: ContourSourceCache;
  private trackOptions: ParseTrackOptions;
  private viewportSettings: Partial<ViewportSettings>;
  private status: WorkspaceStatus;
  private listeners: Set<StatusListener>;
  private disposed: boolean;
  private contourGeneration: number;
  private trackGeneration: number;

  constructor(options: WorkspaceOptions) {
    this.store = options.store ?? new LayerStore();
    this.cache = options.cache;
    this.trackOptions = options.track ?? {};
    this.viewportSettings = options.viewport ?? {};
    this.status = { message: null, loadingSources: false, loadingContour: false, importingTrack: false };
    this.listeners = new Set();
    this.disposed = false;
    this.contourGeneration = 0;
    this.trackGeneration = 0;
  }

  getStatus(): WorkspaceStatus {
    return { ...this.status };
  }

  subscribeStatus(listener: StatusListener): () => void {
    this.listeners.add(listener);
    listener({ ...this.status });
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Reports a message from a collaborator (note engine, exporter) through the same channel. */
  setStatus(message: string | null): void {
    this.updateStatus({ message });
  }

  async loadContourSources(): Promise<ContourSource[]> {
    this.updateStatus({ loadingSources: true });
    try {
      const sources = await this.cache.listSources();
      if (!this.disposed) {
        this.updateStatus({
          message:
            sources.length === 0
              ? "No bundled contour sources found (check the manifest)."
              : `Loaded ${sources.length} bundled contour sources.`
        });
      }
      return sources;
    } finally {
      if (!this.disposed) {
        this.updateStatus({ loadingSources: false });
      }
    }
  }

  /** Adds a contour layer clipped around the loaded tracks, or selects the one already added. */
  async addContourSource(source: ContourSource): Promise<string> {
    const existing = this.store.findContourLayerBySource(source.id);
    if (existing) {
      this.store.select({ kind: "contour", id: existing.id });
      return this.finish(`Contour layer already added: ${existing.name}`);
    }
    if (this.status.loadingContour) {
      return "A contour layer is already loading.";
    }

    const generation = ++this.contourGeneration;
    this.updateStatus({ loadingContour: true, message: `Loading contours: ${source.name}` });
    try {
      const loaded = await this.cache.loadSourceWithFallback(source, this.store.contourClipBounds());
      if (this.isStale(generation, this.contourGeneration)) {
        return "Contour load discarded.";
      }
      const layer = this.store.addContourLayer(source, loaded);
      return this.finish(`Contour layer added: ${source.name} (${layer.lines.length} lines)`);
    } catch (error) {
      if (this.isStale(generation, this.contourGeneration)) {
        return "Contour load discarded.";
      }
      console.warn("[contours] Contour source failed to load.", error);
      return this.finish(`Contour load failed: ${describeError(error)}`);
    } finally {
      if (!this.disposed && generation === this.contourGeneration) {
        this.updateStatus({ loadingContour: false });
      }
    }
  }

  /** Parses GPX content and adds it as a new, selected track layer. */
  async importTrack(name: string, content: TrackContent): Promise<string> {
    const generation = ++this.trackGeneration;
    this.updateStatus({ importingTrack: true, message: null });
    try {
      const bytes = await content;
      if (this.isStale(generation, this.trackGeneration)) {
        return "Track import discarded.";
      }
      const polylines = parseTrack(bytes, this.trackOptions);
      this.store.addTrack(name, polylines);
      return this.finish(`Track loaded: ${name}`);
    } catch (error) {
      if (this.isStale(generation, this.trackGeneration)) {
        return "Track import discarded.";
      }
      console.warn("[gpx] Track import failed.", error);
      return this.finish(`Track load failed: ${describeError(error)}`);
    } finally {
      if (!this.disposed && generation === this.trackGeneration) {
        this.updateStatus({ importingTrack: false });
      }
    }
  }

  /** Base projector for the current combined bounds at the given canvas size. */
  createProjector(canvas: Size): ViewportProjector {
    return new ViewportProjector(this.store.combinedBounds(), canvas, this.viewportSettings);
  }

  /**
   * Transform that frames the selected layer, or every visible layer when
   * nothing visible is selected. Identity until the viewport has been measured.
   */
  resetView(canvas: Size | null, viewport: Size | null): ViewTransform {
    const target = this.store.selectedBounds() ?? this.store.visibleBounds();
    const projector = canvas ? this.createProjector(canvas) : null;
    return fitToBounds(projector, target, viewport, this.viewportSettings);
  }

  dispose(): void {
    this.disposed = true;
    this.contourGeneration += 1;
    this.trackGeneration += 1;
    this.listeners.clear();
  }

  private isStale(generation: number, current: number): boolean {
    return this.disposed || generation !== current;
  }

  private finish(message: string): string {
    this.updateStatus({ message });
    return message;
  }

  private updateStatus(patch: Partial<WorkspaceStatus>): void {
    this.status = { ...this.status, ...patch };
    const snapshot = { ...this.status };
    this.listeners.forEach((listener) => listener(snapshot));
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
