import { DEFAULT_BOUNDS, DEFAULT_LAYER_STYLE, type BoundsSettings } from "./settings";
import { UNIT_RECT, boundsOfLines, inflateRect, unionRect } from "./geometry";
import type {
  BaseOverlay,
  ContourLayer,
  ContourSource,
  DecorationKind,
  Decorations,
  LayerStyle,
  LoadedContours,
  Point,
  Rect,
  Selection,
  TrackLayer,
  TrackNote
} from "./types";

export interface LayerStoreState {
  base: BaseOverlay;
  contourLayers: readonly ContourLayer[];
  tracks: readonly TrackLayer[];
  selection: Selection;
  decorations: Decorations;
}

type StoreListener = (state: LayerStoreState) => void;

/** Store changes that end or narrow a note-editing interaction. */
export type EditExitEvent =
  | { reason: "selection" }
  | { reason: "trackRemoved"; trackId: string }
  | { reason: "trackHidden"; trackId: string }
  | { reason: "noteRemoved"; trackId: string; noteId: string }
  | { reason: "noteHidden"; trackId: string; noteId: string };

type EditExitListener = (event: EditExitEvent) => void;

export type NotePatch = Partial<Pick<TrackNote, "text" | "labelOffset" | "visible">>;

const NO_SELECTION: Selection = { kind: "none" };

const EMPTY_BASE: BaseOverlay = { bounds: { ...UNIT_RECT }, lines: [] };

const DEFAULT_DECORATIONS: Decorations = {
  title: false,
  northArrow: false,
  legend: false,
  titleText: "",
  titleColor: "#2c3e50",
  titleFontSize: 28
};

export interface LayerStoreOptions {
  base?: BaseOverlay;
  bounds?: Partial<BoundsSettings>;
}

/**
 * Sole owner of layer and note records. Records are never edited in place;
 * every update builds a new record and swaps it into a new array.
 */
export class LayerStore {
  private state: LayerStoreState;
  private boundsSettings: BoundsSettings;
  private trackSerial: number;
  private listeners: Set<StoreListener>;
  private editExitListeners: Set<EditExitListener>;

  constructor(options: LayerStoreOptions = {}) {
    this.state = {
      base: options.base ?? EMPTY_BASE,
      contourLayers: [],
      tracks: [],
      selection: NO_SELECTION,
      decorations: { ...DEFAULT_DECORATIONS }
    };
    this.boundsSettings = { ...DEFAULT_BOUNDS, ...options.bounds };
    this.trackSerial = 0;
    this.listeners = new Set();
    this.editExitListeners = new Set();
  }

  getState(): LayerStoreState {
    return this.state;
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.add(listener);
    listener(this.state);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onEditExit(listener: EditExitListener): () => void {
    this.editExitListeners.add(listener);
    return () => {
      this.editExitListeners.delete(listener);
    };
  }

  // Selection

  select(selection: Selection): void {
    if (sameSelection(this.state.selection, selection)) {
      return;
    }
    this.commit({ selection });
    this.exitEdit({ reason: "selection" });
  }

  clearSelection(): void {
    this.select(NO_SELECTION);
  }

  getSelection(): Selection {
    return this.state.selection;
  }

  selectedTrack(): TrackLayer | null {
    const selection = this.state.selection;
    if (selection.kind !== "track") {
      return null;
    }
    return this.getTrack(selection.id);
  }

  selectedContourLayer(): ContourLayer | null {
    const selection = this.state.selection;
    if (selection.kind !== "contour") {
      return null;
    }
    return this.getContourLayer(selection.id);
  }

  // Contour layers

  getContourLayer(id: string): ContourLayer | null {
    return this.state.contourLayers.find((layer) => layer.id === id) ?? null;
  }

  findContourLayerBySource(sourceId: string): ContourLayer | null {
    return this.state.contourLayers.find((layer) => layer.sourceId === sourceId) ?? null;
  }

  addContourLayer(source: ContourSource, loaded: LoadedContours): ContourLayer {
    const existing = this.findContourLayerBySource(source.id);
    if (existing) {
      this.select({ kind: "contour", id: existing.id });
      return existing;
    }
    const layer: ContourLayer = {
      id: `contour_${source.id}`,
      sourceId: source.id,
      name: source.name,
      bounds: loaded.bounds,
      lines: loaded.lines,
      visible: true,
      color: DEFAULT_LAYER_STYLE.contourColor,
      strokeWidth: DEFAULT_LAYER_STYLE.contourWidth,
      opacity: DEFAULT_LAYER_STYLE.contourOpacity
    };
    this.commit({
      contourLayers: [...this.state.contourLayers, layer],
      selection: { kind: "contour", id: layer.id }
    });
    this.exitEdit({ reason: "selection" });
    return layer;
  }

  setContourVisible(id: string, visible: boolean): void {
    this.replaceContourLayer(id, (layer) => ({ ...layer, visible }));
  }

  removeContourLayer(id: string): void {
    if (!this.getContourLayer(id)) {
      return;
    }
    const wasSelected = isSelected(this.state.selection, "contour", id);
    this.commit({
      contourLayers: this.state.contourLayers.filter((layer) => layer.id !== id),
      selection: wasSelected ? NO_SELECTION : this.state.selection
    });
  }

  // Tracks

  getTrack(id: string): TrackLayer | null {
    return this.state.tracks.find((track) => track.id === id) ?? null;
  }

  addTrack(name: string, polylines: readonly (readonly Point[])[]): TrackLayer {
    this.trackSerial += 1;
    const palette = DEFAULT_LAYER_STYLE.trackPalette;
    const track: TrackLayer = {
      id: `track_${this.trackSerial}`,
      name,
      polylines,
      notes: [],
      visible: true,
      color: palette[(this.trackSerial - 1) % palette.length],
      strokeWidth: DEFAULT_LAYER_STYLE.trackWidth,
      opacity: DEFAULT_LAYER_STYLE.trackOpacity
    };
    this.commit({
      tracks: [...this.state.tracks, track],
      selection: { kind: "track", id: track.id }
    });
    this.exitEdit({ reason: "selection" });
    return track;
  }

  setTrackVisible(id: string, visible: boolean): void {
    if (!this.getTrack(id)) {
      return;
    }
    this.replaceTrack(id, (track) => ({ ...track, visible }));
    if (!visible) {
      this.exitEdit({ reason: "trackHidden", trackId: id });
    }
  }

  removeTrack(id: string): void {
    if (!this.getTrack(id)) {
      return;
    }
    const wasSelected = isSelected(this.state.selection, "track", id);
    this.commit({
      tracks: this.state.tracks.filter((track) => track.id !== id),
      selection: wasSelected ? NO_SELECTION : this.state.selection
    });
    this.exitEdit({ reason: "trackRemoved", trackId: id });
  }

  // Notes

  addNote(trackId: string, note: TrackNote): boolean {
    return this.replaceTrack(trackId, (track) => ({ ...track, notes: [...track.notes, note] }));
  }

  updateNote(trackId: string, noteId: string, patch: NotePatch): boolean {
    const updated = this.replaceTrack(trackId, (track) => {
      if (!track.notes.some((note) => note.id === noteId)) {
        return null;
      }
      return {
        ...track,
        notes: track.notes.map((note) => (note.id === noteId ? { ...note, ...patch } : note))
      };
    });
    if (updated && patch.visible === false) {
      this.exitEdit({ reason: "noteHidden", trackId, noteId });
    }
    return updated;
  }

  removeNote(trackId: string, noteId: string): boolean {
    const removed = this.replaceTrack(trackId, (track) => {
      if (!track.notes.some((note) => note.id === noteId)) {
        return null;
      }
      return { ...track, notes: track.notes.filter((note) => note.id !== noteId) };
    });
    if (removed) {
      this.exitEdit({ reason: "noteRemoved", trackId, noteId });
    }
    return removed;
  }

  // Style

  /** Restyles whichever contour or track layer is selected; returns false when neither is. */
  updateSelectedStyle(style: Partial<LayerStyle>): boolean {
    const selection = this.state.selection;
    if (selection.kind === "track") {
      return this.replaceTrack(selection.id, (track) => ({ ...track, ...style }));
    }
    if (selection.kind === "contour") {
      return this.replaceContourLayer(selection.id, (layer) => ({ ...layer, ...style }));
    }
    return false;
  }

  // Decorations

  setDecorationVisible(kind: DecorationKind, visible: boolean): void {
    if (this.state.decorations[kind] === visible) {
      return;
    }
    const decorations: Decorations = { ...this.state.decorations };
    decorations[kind] = visible;
    this.commit({ decorations });
  }

  setDecorations(patch: Partial<Decorations>): void {
    this.commit({ decorations: { ...this.state.decorations, ...patch } });
  }

  // Bounds

  trackBounds(track: TrackLayer): Rect {
    const bounds = boundsOfLines(track.polylines) ?? { ...UNIT_RECT };
    return inflateRect(bounds, this.boundsSettings.trackMargin);
  }

  /** Union of the base dataset, visible contour layers and visible tracks (with margin). */
  combinedBounds(options: { includeHidden?: boolean } = {}): Rect {
    const includeHidden = options.includeHidden ?? false;
    let bounds: Rect | null = this.state.base.lines.length > 0 ? this.state.base.bounds : null;
    for (const layer of this.state.contourLayers) {
      if (includeHidden || layer.visible) {
        bounds = bounds ? unionRect(bounds, layer.bounds) : layer.bounds;
      }
    }
    for (const track of this.state.tracks) {
      if (includeHidden || track.visible) {
        const trackBounds = this.trackBounds(track);
        bounds = bounds ? unionRect(bounds, trackBounds) : trackBounds;
      }
    }
    return bounds ?? { ...UNIT_RECT };
  }

  selectedBounds(): Rect | null {
    const contour = this.selectedContourLayer();
    if (contour?.visible) {
      return contour.bounds;
    }
    const track = this.selectedTrack();
    if (track?.visible) {
      return this.trackBounds(track);
    }
    return null;
  }

  visibleBounds(): Rect | null {
    let bounds: Rect | null = null;
    for (const layer of this.state.contourLayers) {
      if (layer.visible) {
        bounds = bounds ? unionRect(bounds, layer.bounds) : layer.bounds;
      }
    }
    for (const track of this.state.tracks) {
      if (track.visible) {
        const trackBounds = this.trackBounds(track);
        bounds = bounds ? unionRect(bounds, trackBounds) : trackBounds;
      }
    }
    return bounds;
  }

  /** All tracks, hidden ones included, without margin. */
  tracksBounds(): Rect | null {
    let bounds: Rect | null = null;
    for (const track of this.state.tracks) {
      const trackBounds = boundsOfLines(track.polylines);
      if (trackBounds) {
        bounds = bounds ? unionRect(bounds, trackBounds) : trackBounds;
      }
    }
    return bounds;
  }

  contourClipBounds(): Rect | null {
    const bounds = this.tracksBounds();
    return bounds ? inflateRect(bounds, this.boundsSettings.contourClipMargin) : null;
  }

  private replaceTrack(id: string, update: (track: TrackLayer) => TrackLayer | null): boolean {
    const index = this.state.tracks.findIndex((track) => track.id === id);
    if (index === -1) {
      return false;
    }
    const next = update(this.state.tracks[index]);
    if (!next) {
      return false;
    }
    const tracks = [...this.state.tracks];
    tracks[index] = next;
    this.commit({ tracks });
    return true;
  }

  private replaceContourLayer(
    id: string,
    update: (layer: ContourLayer) => ContourLayer
  ): boolean {
    const index = this.state.contourLayers.findIndex((layer) => layer.id === id);
    if (index === -1) {
      return false;
    }
    const contourLayers = [...this.state.contourLayers];
    contourLayers[index] = update(contourLayers[index]);
    this.commit({ contourLayers });
    return true;
  }

  private commit(patch: Partial<LayerStoreState>): void {
    this.state = { ...this.state, ...patch };
    const snapshot = this.state;
    this.listeners.forEach((listener) => listener(snapshot));
  }

  private exitEdit(event: EditExitEvent): void {
    this.editExitListeners.forEach((listener) => listener(event));
  }
}

function isSelected(selection: Selection, kind: "contour" | "track", id: string): boolean {
  return (selection.kind === "contour" || selection.kind === "track") &&
    selection.kind === kind &&
    selection.id === id;
}

function sameSelection(a: Selection, b: Selection): boolean {
  switch (a.kind) {
    case "none":
      return b.kind === "none";
    case "contour":
    case "track":
      return (b.kind === "contour" || b.kind === "track") && b.kind === a.kind && b.id === a.id;
    case "decoration":
      return b.kind === "decoration" && b.decoration === a.decoration;
  }
}
