export * from "./types";
export * from "./settings";
export * from "./geometry";
export * from "./geodetic";
export * from "./gpx";
export * from "./contourSources";
export * from "./layerStore";
export * from "./viewport";
export * from "./contourLod";
export * from "./noteLabels";
export * from "./trackNotes";
export * from "./scene";
export * from "./canvasPainter";
export * from "./exportImage";
export * from "./workspace";
