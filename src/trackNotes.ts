import { DEFAULT_NOTE_HIT, NOTE_FONT_FAMILIES, resolveNoteFontFamily, type NoteHitSettings } from "./settings";
import {
  addPoints,
  closestPointOnSegment,
  distance,
  distanceToRect,
  inflateRect,
  lerpPoint,
  subtractPoints
} from "./geometry";
import { approximateTextMeasurer, buildNoteLabelLayout, type TextMeasurer } from "./noteLabels";
import { toScene, type ViewTransform, type ViewportProjector } from "./viewport";
import type { EditExitEvent, LayerStore } from "./layerStore";
import type { Point, TrackLayer, TrackNote } from "./types";

export type NoteAction = "edit" | "moveText" | "delete";

export interface TextPromptRequest {
  title: string;
  initialValue: string;
  maxLength: number;
}

/**
 * Presentation-layer round trips. Both resolve to null when the user
 * dismisses the dialog.
 */
export interface NotePresenter {
  promptText(request: TextPromptRequest): Promise<string | null>;
  chooseAction(noteText: string): Promise<NoteAction | null>;
}

/** Current view: the base projector plus the pan/zoom transform on top of it. */
export interface PointerContext {
  projector: ViewportProjector;
  transform: ViewTransform;
}

export interface NearestTrackPoint {
  worldPoint: Point;
  distancePx: number;
}

export type NoteHitTarget = "marker" | "label";

export interface NearestNote {
  note: TrackNote;
  distancePx: number;
  target: NoteHitTarget;
}

export type NoteInteraction =
  | { phase: "idle" }
  | { phase: "moveReady"; trackId: string; noteId: string }
  | { phase: "dragging"; trackId: string; noteId: string; grabDelta: Point };

export interface TrackNoteEngineOptions {
  store: LayerStore;
  presenter: NotePresenter;
  measurer?: TextMeasurer;
  fontFamily?: string;
  settings?: Partial<NoteHitSettings>;
  createId?: () => string;
}

const IDLE: NoteInteraction = { phase: "idle" };
const DISCARDED_ACTION = "Track changed while the dialog was open; note action discarded.";

/**
 * Closest point on any segment of the track to `canvasTap`, measured in scene
 * pixels. The returned world point interpolates the world endpoints with the
 * same segment factor.
 */
export function findNearestTrackPoint(
  track: Pick<TrackLayer, "polylines">,
  canvasTap: Point,
  projector: ViewportProjector
): NearestTrackPoint | null {
  let nearest: NearestTrackPoint | null = null;
  let bestDistSq = Number.POSITIVE_INFINITY;
  for (const line of track.polylines) {
    for (let i = 1; i < line.length; i += 1) {
      const aWorld = line[i - 1];
      const bWorld = line[i];
      const hit = closestPointOnSegment(canvasTap, projector.toCanvas(aWorld), projector.toCanvas(bWorld));
      if (hit.distanceSq < bestDistSq) {
        bestDistSq = hit.distanceSq;
        nearest = {
          worldPoint: lerpPoint(aWorld, bWorld, hit.t),
          distancePx: Math.sqrt(hit.distanceSq)
        };
      }
    }
  }
  return nearest;
}

/** Closest visible note by marker distance or by distance to its inflated label box. */
export function findNearestNote(
  track: Pick<TrackLayer, "notes">,
  canvasTap: Point,
  projector: ViewportProjector,
  options: { fontFamily: string; measurer?: TextMeasurer; labelInflatePx?: number }
): NearestNote | null {
  const inflate = options.labelInflatePx ?? DEFAULT_NOTE_HIT.labelInflateTapPx;
  let nearest: NearestNote | null = null;
  let best = Number.POSITIVE_INFINITY;
  for (const note of track.notes) {
    if (!note.visible) {
      continue;
    }
    const markerDistance = distance(projector.toCanvas(note.anchorPoint), canvasTap);
    if (markerDistance < best) {
      best = markerDistance;
      nearest = { note, distancePx: markerDistance, target: "marker" };
    }
    const layout = buildNoteLabelLayout(note, projector, options.fontFamily, options.measurer);
    const labelDistance = distanceToRect(canvasTap, inflateRect(layout.rect, inflate));
    if (labelDistance < best) {
      best = labelDistance;
      nearest = { note, distancePx: labelDistance, target: "label" };
    }
  }
  return nearest;
}

/** Fixed pixel offset from the anchor, converted to world units at the current scale. */
export function defaultLabelOffset(
  projector: ViewportProjector,
  offsetPx: Point = DEFAULT_NOTE_HIT.defaultLabelOffsetPx
): Point {
  return { x: projector.pixelsToWorld(offsetPx.x), y: projector.pixelsToWorld(offsetPx.y) };
}

/**
 * Tap and drag handling for notes on the selected track. Owns the single
 * in-flight dialog guard; every entry point reports a status string instead
 * of throwing.
 */
export class TrackNoteEngine {
  private store: LayerStore;
  private presenter: NotePresenter;
  private measurer: TextMeasurer;
  private fontFamily: string;
  private settings: NoteHitSettings;
  private createId: () => string;
  private editing: boolean;
  private modalOpen: boolean;
  private interaction: NoteInteraction;
  private detachStore: () => void;

  constructor(options: TrackNoteEngineOptions) {
    this.store = options.store;
    this.presenter = options.presenter;
    this.measurer = options.measurer ?? approximateTextMeasurer;
    this.fontFamily = resolveNoteFontFamily(options.fontFamily);
    this.settings = { ...DEFAULT_NOTE_HIT, ...options.settings };
    this.createId = options.createId ?? createNoteId;
    this.editing = false;
    this.modalOpen = false;
    this.interaction = IDLE;
    this.detachStore = this.store.onEditExit((event) => this.handleStoreExit(event));
  }

  dispose(): void {
    this.detachStore();
  }

  isEditing(): boolean {
    return this.editing;
  }

  isModalOpen(): boolean {
    return this.modalOpen;
  }

  getInteraction(): NoteInteraction {
    return this.interaction;
  }

  getFontFamily(): string {
    return this.fontFamily;
  }

  setFontFamily(family: string): void {
    this.fontFamily = resolveNoteFontFamily(family);
  }

  get fontOptions(): readonly string[] {
    return NOTE_FONT_FAMILIES;
  }

  toggleEditMode(): string {
    if (!this.store.selectedTrack()) {
      return "Select a GPX track in the layer list first.";
    }
    this.editing = !this.editing;
    if (!this.editing) {
      this.interaction = IDLE;
      return "Track edit mode off.";
    }
    return "Track edit mode on: tap to add, edit or delete notes; move text from the note menu.";
  }

  async handleTap(local: Point, view: PointerContext): Promise<string> {
    if (!this.editing) {
      return "Track edit mode is off.";
    }
    if (this.modalOpen) {
      return "A note dialog is already open.";
    }
    try {
      const track = this.store.selectedTrack();
      if (!track || !track.visible) {
        this.editing = false;
        this.interaction = IDLE;
        return "Select a visible GPX track and try again.";
      }

      const canvasTap = toScene(view.transform, local);
      const nearestNote = findNearestNote(track, canvasTap, view.projector, {
        fontFamily: this.fontFamily,
        measurer: this.measurer,
        labelInflatePx: this.settings.labelInflateTapPx
      });
      if (nearestNote && nearestNote.distancePx <= this.noteThreshold(nearestNote.target)) {
        return await this.handleNoteAction(track.id, nearestNote.note);
      }

      if (this.interaction.phase === "moveReady" && this.interaction.trackId === track.id) {
        return "Waiting to move text: drag the selected label.";
      }

      const nearestOnTrack = findNearestTrackPoint(track, canvasTap, view.projector);
      if (!nearestOnTrack || nearestOnTrack.distancePx > this.settings.trackHitPx) {
        return "Tap the track line or an existing note.";
      }

      const text = await this.withModal(() =>
        this.presenter.promptText({
          title: "Add note",
          initialValue: "",
          maxLength: this.settings.maxTextLength
        })
      );
      const trimmed = this.clampText(text);
      if (!trimmed) {
        return "Note not added.";
      }
      const note: TrackNote = {
        id: this.createId(),
        anchorPoint: nearestOnTrack.worldPoint,
        text: trimmed,
        labelOffset: defaultLabelOffset(view.projector, this.settings.defaultLabelOffsetPx),
        visible: true
      };
      if (!this.isSessionLive(track.id) || !this.store.addNote(track.id, note)) {
        return "Track changed while the dialog was open; note discarded.";
      }
      return `Note added: ${trimmed}`;
    } catch (error) {
      return `Note edit failed: ${describeError(error)}`;
    }
  }

  /**
   * Starts a label drag when a note is armed for moving and the pointer lands
   * on its label. Returns true when the gesture was captured.
   */
  handleDragStart(local: Point, view: PointerContext): boolean {
    if (!this.editing || this.modalOpen || this.interaction.phase !== "moveReady") {
      return false;
    }
    const track = this.store.selectedTrack();
    if (!track || !track.visible || track.id !== this.interaction.trackId) {
      return false;
    }
    const noteId = this.interaction.noteId;
    const note = track.notes.find((candidate) => candidate.id === noteId && candidate.visible);
    if (!note) {
      return false;
    }
    const canvasPoint = toScene(view.transform, local);
    const layout = buildNoteLabelLayout(note, view.projector, this.fontFamily, this.measurer);
    const hitRect = inflateRect(layout.rect, this.settings.labelInflateDragPx);
    if (distanceToRect(canvasPoint, hitRect) > this.settings.dragStartSlopPx) {
      return false;
    }
    const pointerWorld = view.projector.toWorld(canvasPoint);
    const labelCenterWorld = addPoints(note.anchorPoint, note.labelOffset);
    this.interaction = {
      phase: "dragging",
      trackId: track.id,
      noteId: note.id,
      grabDelta: subtractPoints(labelCenterWorld, pointerWorld)
    };
    return true;
  }

  handleDragUpdate(local: Point, view: PointerContext): boolean {
    if (!this.editing || this.modalOpen || this.interaction.phase !== "dragging") {
      return false;
    }
    const { trackId, noteId, grabDelta } = this.interaction;
    const note = this.store.getTrack(trackId)?.notes.find((candidate) => candidate.id === noteId);
    if (!note) {
      return false;
    }
    const pointerWorld = view.projector.toWorld(toScene(view.transform, local));
    const labelCenterWorld = addPoints(pointerWorld, grabDelta);
    return this.store.updateNote(trackId, noteId, {
      labelOffset: subtractPoints(labelCenterWorld, note.anchorPoint)
    });
  }

  handleDragEnd(): string | null {
    if (this.interaction.phase !== "dragging") {
      return null;
    }
    this.interaction = IDLE;
    return "Label moved.";
  }

  private async handleNoteAction(trackId: string, note: TrackNote): Promise<string> {
    const action = await this.withModal(() => this.presenter.chooseAction(note.text));
    if (!action) {
      return "No note action chosen.";
    }
    if (!this.isSessionLive(trackId)) {
      return DISCARDED_ACTION;
    }
    if (action === "moveText") {
      this.interaction = { phase: "moveReady", trackId, noteId: note.id };
      return "Ready to move text: drag the label.";
    }
    this.interaction = IDLE;
    if (action === "delete") {
      return this.store.removeNote(trackId, note.id) ? "Note deleted." : "Note no longer exists.";
    }

    const edited = await this.withModal(() =>
      this.presenter.promptText({
        title: "Edit note",
        initialValue: note.text,
        maxLength: this.settings.maxTextLength
      })
    );
    if (!this.isSessionLive(trackId)) {
      return DISCARDED_ACTION;
    }
    const trimmed = this.clampText(edited);
    if (!trimmed) {
      return "Note unchanged.";
    }
    if (!this.store.updateNote(trackId, note.id, { text: trimmed })) {
      return "Note no longer exists.";
    }
    return `Note updated: ${trimmed}`;
  }

  /** Edit mode is still on and the track is still the selected one. */
  private isSessionLive(trackId: string): boolean {
    return this.editing && this.store.selectedTrack()?.id === trackId;
  }

  private noteThreshold(target: NoteHitTarget): number {
    return target === "label" ? this.settings.labelHitPx : this.settings.markerHitPx;
  }

  private clampText(text: string | null): string {
    if (text === null) {
      return "";
    }
    return Array.from(text.trim()).slice(0, this.settings.maxTextLength).join("").trim();
  }

  private async withModal<T>(open: () => Promise<T | null>): Promise<T | null> {
    if (this.modalOpen) {
      return null;
    }
    this.modalOpen = true;
    try {
      return await open();
    } finally {
      this.modalOpen = false;
    }
  }

  private handleStoreExit(event: EditExitEvent): void {
    switch (event.reason) {
      case "selection":
        this.editing = false;
        this.interaction = IDLE;
        return;
      case "trackRemoved":
      case "trackHidden":
        if (this.interaction.phase !== "idle" && this.interaction.trackId === event.trackId) {
          this.interaction = IDLE;
        }
        if (!this.store.selectedTrack()?.visible) {
          this.editing = false;
          this.interaction = IDLE;
        }
        return;
      case "noteRemoved":
      case "noteHidden":
        if (
          this.interaction.phase !== "idle" &&
          this.interaction.trackId === event.trackId &&
          this.interaction.noteId === event.noteId
        ) {
          this.interaction = IDLE;
        }
        return;
    }
  }
}

function createNoteId(): string {
  if (typeof crypto !== "undefined" && "randomUUID" in crypto) {
    return `note_${crypto.randomUUID()}`;
  }
  return `note_${Date.now().toString(36)}_${Math.random().toString(36).slice(2)}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
