import { projectLine } from "./geodetic";
import type { Point } from "./types";

export class MalformedTrackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedTrackError";
  }
}

export interface ParseTrackOptions {
  /** Defaults to the global `DOMParser` (browser or jsdom). */
  domParser?: Pick<DOMParser, "parseFromString">;
}

const MIN_LINE_POINTS = 2;

/**
 * Reads every `trkseg` as its own polyline, falling back to the flat `rtept`
 * list when no segment has at least two usable points. Points are projected
 * into grid coordinates; source order is kept.
 */
export function parseTrack(xml: string | Uint8Array, options: ParseTrackOptions = {}): Point[][] {
  const text = typeof xml === "string" ? xml : new TextDecoder("utf-8").decode(xml);
  const doc = parseXml(text, options.domParser);

  const lines: Point[][] = [];
  for (const segment of elementsByLocalName(doc, "trkseg")) {
    const lonLat = readLonLatPoints(elementsByLocalName(segment, "trkpt"));
    if (lonLat.length >= MIN_LINE_POINTS) {
      lines.push(projectLine(lonLat));
    }
  }

  if (lines.length === 0) {
    const routePoints = readLonLatPoints(elementsByLocalName(doc, "rtept"));
    if (routePoints.length >= MIN_LINE_POINTS) {
      lines.push(projectLine(routePoints));
    }
  }

  if (lines.length === 0) {
    throw new MalformedTrackError("No trkpt/rtept line with at least two coordinates was found.");
  }
  return lines;
}

function parseXml(text: string, parser: ParseTrackOptions["domParser"]): Document {
  const domParser = parser ?? (typeof DOMParser !== "undefined" ? new DOMParser() : null);
  if (!domParser) {
    throw new MalformedTrackError("No XML parser is available in this environment.");
  }
  const doc = domParser.parseFromString(text, "application/xml");
  if (elementsByLocalName(doc, "parsererror").length > 0) {
    throw new MalformedTrackError("GPX document is not well-formed XML.");
  }
  return doc;
}

function elementsByLocalName(root: Document | Element, localName: string): Element[] {
  return Array.from(root.getElementsByTagNameNS("*", localName));
}

function readLonLatPoints(points: Element[]): Array<{ lon: number; lat: number }> {
  const result: Array<{ lon: number; lat: number }> = [];
  for (const point of points) {
    const lat = readCoordinate(point.getAttribute("lat"));
    const lon = readCoordinate(point.getAttribute("lon"));
    if (lat === null || lon === null) {
      continue;
    }
    result.push({ lon, lat });
  }
  return result;
}

function readCoordinate(raw: string | null): number | null {
  if (raw === null) {
    return null;
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}
