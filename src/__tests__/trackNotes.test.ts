import { describe, it, expect } from "vitest";
import { LayerStore } from "../layerStore";
import { IDENTITY_TRANSFORM, ViewportProjector } from "../viewport";
import {
  TrackNoteEngine,
  defaultLabelOffset,
  findNearestNote,
  findNearestTrackPoint,
  type NoteAction,
  type NotePresenter,
  type TextPromptRequest
} from "../trackNotes";

// Scale 1 with no padding: canvas = (x, 100 - y).
const projector = new ViewportProjector(
  { left: 0, top: 0, right: 100, bottom: 100 },
  { width: 100, height: 100 },
  { baselineZoomFactor: 1 }
);
const view = { projector, transform: IDENTITY_TRANSFORM };

function scriptedPresenter(texts: Array<string | null>, actions: Array<NoteAction | null> = []) {
  const prompts: TextPromptRequest[] = [];
  const presenter: NotePresenter = {
    promptText: async (request) => {
      prompts.push(request);
      return texts.shift() ?? null;
    },
    chooseAction: async () => actions.shift() ?? null
  };
  return { presenter, prompts };
}

function setup(texts: Array<string | null> = [], actions: Array<NoteAction | null> = []) {
  const store = new LayerStore();
  const track = store.addTrack("walk.gpx", [
    [
      { x: 0, y: 100 },
      { x: 100, y: 100 }
    ]
  ]);
  const { presenter, prompts } = scriptedPresenter(texts, actions);
  let serial = 0;
  const engine = new TrackNoteEngine({
    store,
    presenter,
    createId: () => {
      serial += 1;
      return `note-${serial}`;
    }
  });
  engine.toggleEditMode();
  return { store, track, engine, prompts };
}

describe("hit-testing helpers", () => {
  it("finds the exact midpoint of a segment", () => {
    const nearest = findNearestTrackPoint(
      { polylines: [[{ x: 0, y: 100 }, { x: 100, y: 100 }]] },
      { x: 50, y: 0 },
      projector
    );
    expect(nearest).toEqual({ worldPoint: { x: 50, y: 100 }, distancePx: 0 });
  });

  it("returns null for tracks without segments", () => {
    expect(findNearestTrackPoint({ polylines: [[{ x: 1, y: 1 }]] }, { x: 0, y: 0 }, projector)).toBeNull();
  });

  it("prefers whichever of marker or label is closer", () => {
    const notes = [
      { id: "a", anchorPoint: { x: 50, y: 100 }, text: "Summit", labelOffset: { x: 36, y: 16 }, visible: true },
      { id: "b", anchorPoint: { x: 10, y: 100 }, text: "Gate", labelOffset: { x: 0, y: 0 }, visible: false }
    ];
    const onLabel = findNearestNote({ notes }, { x: 86, y: -16 }, projector, { fontFamily: "Noto Sans KR" });
    expect(onLabel?.note.id).toBe("a");
    expect(onLabel?.target).toBe("label");
    expect(onLabel?.distancePx).toBe(0);

    const onMarker = findNearestNote({ notes }, { x: 50, y: 0 }, projector, { fontFamily: "Noto Sans KR" });
    expect(onMarker?.target).toBe("marker");
    expect(onMarker?.distancePx).toBe(0);
  });

  it("converts the default label offset to world units", () => {
    const zoomed = new ViewportProjector(
      { left: 0, top: 0, right: 100, bottom: 100 },
      { width: 400, height: 400 },
      { baselineZoomFactor: 1 }
    );
    expect(defaultLabelOffset(zoomed)).toEqual({ x: 9, y: 4 });
  });
});

describe("TrackNoteEngine", () => {
  it("needs a selected track for edit mode", () => {
    const store = new LayerStore();
    const engine = new TrackNoteEngine({ store, presenter: scriptedPresenter([]).presenter });
    expect(engine.toggleEditMode()).toBe("Select a GPX track in the layer list first.");
    expect(engine.isEditing()).toBe(false);
  });

  it("ignores taps outside edit mode", async () => {
    const { engine } = setup(["Summit"]);
    engine.toggleEditMode();
    expect(await engine.handleTap({ x: 50, y: 0 }, view)).toBe("Track edit mode is off.");
  });

  it("adds a note on the track with the default offset", async () => {
    const { store, track, engine, prompts } = setup(["  Summit  "]);
    const status = await engine.handleTap({ x: 50, y: 10 }, view);
    expect(status).toBe("Note added: Summit");
    expect(prompts).toEqual([{ title: "Add note", initialValue: "", maxLength: 28 }]);
    expect(store.getTrack(track.id)?.notes).toEqual([
      { id: "note-1", anchorPoint: { x: 50, y: 100 }, text: "Summit", labelOffset: { x: 36, y: 16 }, visible: true }
    ]);
  });

  it("reports taps away from the track", async () => {
    const { engine, prompts } = setup(["Summit"]);
    expect(await engine.handleTap({ x: 50, y: 80 }, view)).toBe("Tap the track line or an existing note.");
    expect(prompts).toHaveLength(0);
  });

  it("does not add a note for empty or cancelled text", async () => {
    const { store, track, engine } = setup(["   ", null]);
    expect(await engine.handleTap({ x: 20, y: 5 }, view)).toBe("Note not added.");
    expect(await engine.handleTap({ x: 20, y: 5 }, view)).toBe("Note not added.");
    expect(store.getTrack(track.id)?.notes).toHaveLength(0);
  });

  it("limits note text length", async () => {
    const { store, track, engine } = setup(["x".repeat(40)]);
    await engine.handleTap({ x: 20, y: 5 }, view);
    expect(store.getTrack(track.id)?.notes[0].text).toBe("x".repeat(28));
  });

  it("edits and deletes an existing note", async () => {
    const { store, track, engine } = setup(["Summit", "  ", "Ridge"], ["edit", "edit", "delete"]);
    await engine.handleTap({ x: 50, y: 10 }, view);

    expect(await engine.handleTap({ x: 50, y: 0 }, view)).toBe("Note unchanged.");
    expect(await engine.handleTap({ x: 50, y: 0 }, view)).toBe("Note updated: Ridge");
    expect(store.getTrack(track.id)?.notes[0].text).toBe("Ridge");
    expect(await engine.handleTap({ x: 50, y: 0 }, view)).toBe("Note deleted.");
    expect(store.getTrack(track.id)?.notes).toHaveLength(0);
  });

  it("moves a label by the dragged world vector", async () => {
    const { store, track, engine } = setup(["Summit"], ["moveText"]);
    await engine.handleTap({ x: 50, y: 10 }, view);

    expect(await engine.handleTap({ x: 86, y: -16 }, view)).toBe("Ready to move text: drag the label.");
    expect(engine.getInteraction()).toEqual({ phase: "moveReady", trackId: track.id, noteId: "note-1" });
    expect(await engine.handleTap({ x: 50, y: 60 }, view)).toBe("Waiting to move text: drag the selected label.");

    expect(engine.handleDragStart({ x: 80, y: -20 }, view)).toBe(true);
    expect(engine.handleDragUpdate({ x: 90, y: -25 }, view)).toBe(true);
    expect(engine.handleDragEnd()).toBe("Label moved.");

    const note = store.getTrack(track.id)?.notes[0];
    expect(note?.anchorPoint).toEqual({ x: 50, y: 100 });
    expect(note?.labelOffset.x).toBeCloseTo(46, 9);
    expect(note?.labelOffset.y).toBeCloseTo(21, 9);
    expect(engine.getInteraction()).toEqual({ phase: "idle" });
  });

  it("maps pointer positions through a panned and zoomed view", async () => {
    const { store, track, engine } = setup(["Summit"], ["moveText"]);
    // local = scene * 2 + (10, 20)
    const zoomed = { projector, transform: { scale: 2, translateX: 10, translateY: 20 } };
    expect(await engine.handleTap({ x: 110, y: 40 }, zoomed)).toBe("Note added: Summit");
    expect(await engine.handleTap({ x: 182, y: -12 }, zoomed)).toBe("Ready to move text: drag the label.");

    expect(engine.handleDragStart({ x: 170, y: -20 }, zoomed)).toBe(true);
    expect(engine.handleDragUpdate({ x: 190, y: -30 }, zoomed)).toBe(true);
    expect(engine.handleDragEnd()).toBe("Label moved.");

    const note = store.getTrack(track.id)?.notes[0];
    expect(note?.anchorPoint).toEqual({ x: 50, y: 100 });
    expect(note?.labelOffset.x).toBeCloseTo(46, 9);
    expect(note?.labelOffset.y).toBeCloseTo(21, 9);
  });

  it("does not start a drag unless a label was armed and grabbed", async () => {
    const { engine } = setup(["Summit"], ["moveText"]);
    await engine.handleTap({ x: 50, y: 10 }, view);
    expect(engine.handleDragStart({ x: 86, y: -16 }, view)).toBe(false);

    await engine.handleTap({ x: 86, y: -16 }, view);
    expect(engine.handleDragStart({ x: 86, y: 60 }, view)).toBe(false);
    expect(engine.handleDragEnd()).toBeNull();
  });

  it("allows one dialog at a time", async () => {
    const store = new LayerStore();
    store.addTrack("walk.gpx", [
      [
        { x: 0, y: 100 },
        { x: 100, y: 100 }
      ]
    ]);
    let resolvePrompt: (value: string | null) => void = () => undefined;
    const presenter: NotePresenter = {
      promptText: () =>
        new Promise<string | null>((resolve) => {
          resolvePrompt = resolve;
        }),
      chooseAction: async () => null
    };
    const engine = new TrackNoteEngine({ store, presenter });
    engine.toggleEditMode();

    const first = engine.handleTap({ x: 50, y: 5 }, view);
    expect(engine.isModalOpen()).toBe(true);
    expect(await engine.handleTap({ x: 50, y: 5 }, view)).toBe("A note dialog is already open.");
    resolvePrompt(null);
    expect(await first).toBe("Note not added.");
    expect(engine.isModalOpen()).toBe(false);
  });

  it("leaves edit mode when the track is hidden or the selection changes", () => {
    const { store, track, engine } = setup();
    store.setTrackVisible(track.id, false);
    expect(engine.isEditing()).toBe(false);

    store.setTrackVisible(track.id, true);
    engine.toggleEditMode();
    expect(engine.isEditing()).toBe(true);
    store.clearSelection();
    expect(engine.isEditing()).toBe(false);
  });

  it("turns edit mode off when tapping with a hidden selected track", async () => {
    const { store, track, engine } = setup();
    engine.dispose();
    store.setTrackVisible(track.id, false);
    expect(await engine.handleTap({ x: 50, y: 0 }, view)).toBe("Select a visible GPX track and try again.");
    expect(engine.isEditing()).toBe(false);
  });

  describe("when the selection changes while a note dialog is open", () => {
    function setupWithNote(createPresenter: (store: LayerStore) => NotePresenter) {
      const store = new LayerStore();
      const track = store.addTrack("walk.gpx", [
        [
          { x: 0, y: 100 },
          { x: 100, y: 100 }
        ]
      ]);
      store.addNote(track.id, {
        id: "n1",
        anchorPoint: { x: 50, y: 100 },
        text: "Summit",
        labelOffset: { x: 36, y: 16 },
        visible: true
      });
      const engine = new TrackNoteEngine({ store, presenter: createPresenter(store) });
      engine.toggleEditMode();
      return { store, track, engine };
    }

    it.each<NoteAction>(["delete", "moveText"])("discards a %s chosen after the track was deselected", async (action) => {
      const { store, track, engine } = setupWithNote((store) => ({
        promptText: async () => null,
        chooseAction: async () => {
          store.clearSelection();
          return action;
        }
      }));

      expect(await engine.handleTap({ x: 50, y: 0 }, view)).toBe(
        "Track changed while the dialog was open; note action discarded."
      );
      expect(store.getTrack(track.id)?.notes.map((note) => note.id)).toEqual(["n1"]);
      expect(engine.getInteraction()).toEqual({ phase: "idle" });
      expect(engine.isEditing()).toBe(false);
    });

    it("discards edited text submitted after the track was deselected", async () => {
      const { store, track, engine } = setupWithNote((store) => ({
        promptText: async () => {
          store.clearSelection();
          return "Ridge";
        },
        chooseAction: async () => "edit"
      }));

      expect(await engine.handleTap({ x: 50, y: 0 }, view)).toBe(
        "Track changed while the dialog was open; note action discarded."
      );
      expect(store.getTrack(track.id)?.notes[0].text).toBe("Summit");
    });
  });

  it("reports presenter failures as status", async () => {
    const store = new LayerStore();
    store.addTrack("walk.gpx", [
      [
        { x: 0, y: 100 },
        { x: 100, y: 100 }
      ]
    ]);
    const presenter: NotePresenter = {
      promptText: async () => {
        throw new Error("dialog closed");
      },
      chooseAction: async () => null
    };
    const engine = new TrackNoteEngine({ store, presenter });
    engine.toggleEditMode();
    expect(await engine.handleTap({ x: 50, y: 5 }, view)).toBe("Note edit failed: dialog closed");
    expect(engine.isModalOpen()).toBe(false);
  });
});
