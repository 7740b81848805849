// Engine settings: defaults, tolerant parsing, JSON file persistence and
// environment overrides. The persisted store is nested by concern; a flat
// object with the same field names is still read.

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";

import { isColor, rgba } from "../types/brands";
import { debugLog } from "../utils/debug";
import { DEFAULT_WINDOW_HEIGHT, DEFAULT_WINDOW_WIDTH } from "../runtime/screen";

import type { Color } from "../types/brands";

export type EngineSettings = Readonly<{
  title: string;
  windowWidth: number;
  windowHeight: number;
  /** Yield after each tick, in milliseconds. Not a frame limiter. */
  pacingMs: number;
  fpsVisible: boolean;
  fpsFont: string;
  fpsFontSize: number;
  fpsColor: Color;
}>;

type MutableSettings = { -readonly [K in keyof EngineSettings]?: EngineSettings[K] };

type PersistedStore = Partial<{
  window: Partial<{ title: string; width: number; height: number }>;
  loop: Partial<{ pacingMs: number }>;
  fps: Partial<{ visible: boolean; font: string; size: number; color: number }>;
}>;

export const DEFAULT_SETTINGS: EngineSettings = {
  fpsColor: rgba(255, 0, 0),
  fpsFont: "Courier New",
  fpsFontSize: 14,
  fpsVisible: true,
  pacingMs: 1,
  title: "",
  windowHeight: DEFAULT_WINDOW_HEIGHT,
  windowWidth: DEFAULT_WINDOW_WIDTH,
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

function isString(x: unknown): x is string {
  return typeof x === "string";
}

function isDimension(x: unknown): x is number {
  return isNumber(x) && Number.isInteger(x) && x > 0;
}

function isPacing(x: unknown): x is number {
  return isNumber(x) && x >= 0;
}

function mergeSettings(
  base: EngineSettings,
  partial: Partial<EngineSettings>,
): EngineSettings {
  return {
    fpsColor: partial.fpsColor ?? base.fpsColor,
    fpsFont: partial.fpsFont ?? base.fpsFont,
    fpsFontSize: partial.fpsFontSize ?? base.fpsFontSize,
    fpsVisible: partial.fpsVisible ?? base.fpsVisible,
    pacingMs: partial.pacingMs ?? base.pacingMs,
    title: partial.title ?? base.title,
    windowHeight: partial.windowHeight ?? base.windowHeight,
    windowWidth: partial.windowWidth ?? base.windowWidth,
  };
}

/** Later partials win; omitted or undefined fields keep the earlier value. */
export function resolveSettings(
  ...partials: ReadonlyArray<Partial<EngineSettings>>
): EngineSettings {
  return partials.reduce<EngineSettings>(mergeSettings, DEFAULT_SETTINGS);
}

function readFields(
  src: Record<string, unknown>,
  keys: Readonly<{
    title: string;
    width: string;
    height: string;
    pacing: string;
    visible: string;
    font: string;
    size: string;
    color: string;
  }>,
  out: MutableSettings,
): void {
  const title = src[keys.title];
  if (isString(title)) out.title = title;
  const width = src[keys.width];
  if (isDimension(width)) out.windowWidth = width;
  const height = src[keys.height];
  if (isDimension(height)) out.windowHeight = height;
  const pacing = src[keys.pacing];
  if (isPacing(pacing)) out.pacingMs = pacing;
  const visible = src[keys.visible];
  if (isBoolean(visible)) out.fpsVisible = visible;
  const font = src[keys.font];
  if (isString(font) && font.length > 0) out.fpsFont = font;
  const size = src[keys.size];
  if (isDimension(size)) out.fpsFontSize = size;
  const color = src[keys.color];
  if (isColor(color)) out.fpsColor = color;
}

function extractFromNested(store: Record<string, unknown>): MutableSettings {
  const out: MutableSettings = {};
  const merged: Record<string, unknown> = {};
  for (const section of ["window", "loop", "fps"] as const) {
    const value = store[section];
    if (!isRecord(value)) continue;
    for (const [k, v] of Object.entries(value)) merged[`${section}.${k}`] = v;
  }
  readFields(
    merged,
    {
      color: "fps.color",
      font: "fps.font",
      height: "window.height",
      pacing: "loop.pacingMs",
      size: "fps.size",
      title: "window.title",
      visible: "fps.visible",
      width: "window.width",
    },
    out,
  );
  return out;
}

function extractFromFlat(store: Record<string, unknown>): MutableSettings {
  const out: MutableSettings = {};
  readFields(
    store,
    {
      color: "fpsColor",
      font: "fpsFont",
      height: "windowHeight",
      pacing: "pacingMs",
      size: "fpsFontSize",
      title: "title",
      visible: "fpsVisible",
      width: "windowWidth",
    },
    out,
  );
  return out;
}

/**
 * Pick the valid fields out of an arbitrary value. Unknown and mistyped
 * fields are dropped; nothing here throws.
 */
export function parseSettings(raw: unknown): Partial<EngineSettings> {
  if (!isRecord(raw)) return {};
  const nested = extractFromNested(raw);
  if (Object.keys(nested).length > 0) return nested;
  return extractFromFlat(raw);
}

function readStore(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  const parsed: unknown = JSON.parse(readFileSync(path, "utf8"));
  return isRecord(parsed) ? parsed : {};
}

/** Settings stored at `path`; a missing or unreadable file yields `{}`. */
export function loadSettings(path: string): Partial<EngineSettings> {
  try {
    const settings = parseSettings(readStore(path));
    debugLog("config", `loaded settings from ${path}`, settings);
    return settings;
  } catch (error) {
    debugLog("config", `ignoring unreadable settings at ${path}`, error);
    return {};
  }
}

function serialize(settings: Partial<EngineSettings>): PersistedStore {
  const window: NonNullable<PersistedStore["window"]> = {};
  if (settings.title !== undefined) window.title = settings.title;
  if (settings.windowWidth !== undefined) window.width = settings.windowWidth;
  if (settings.windowHeight !== undefined)
    window.height = settings.windowHeight;

  const loop: NonNullable<PersistedStore["loop"]> = {};
  if (settings.pacingMs !== undefined) loop.pacingMs = settings.pacingMs;

  const fps: NonNullable<PersistedStore["fps"]> = {};
  if (settings.fpsVisible !== undefined) fps.visible = settings.fpsVisible;
  if (settings.fpsFont !== undefined) fps.font = settings.fpsFont;
  if (settings.fpsFontSize !== undefined) fps.size = settings.fpsFontSize;
  if (settings.fpsColor !== undefined) fps.color = settings.fpsColor;

  return { fps, loop, window };
}

function section(
  store: Record<string, unknown>,
  key: string,
): Record<string, unknown> {
  const value = store[key];
  return isRecord(value) ? value : {};
}

/**
 * Merge `settings` into the store at `path`, keeping fields this module does
 * not know about. Returns false (and warns) when the file cannot be written.
 */
export function saveSettings(
  path: string,
  settings: Partial<EngineSettings>,
): boolean {
  try {
    let store: Record<string, unknown>;
    try {
      store = readStore(path);
    } catch (error) {
      debugLog("config", `replacing unreadable settings at ${path}`, error);
      store = {};
    }
    const snapshot = serialize(settings);

    const next: Record<string, unknown> = { ...store };
    next["window"] = { ...section(store, "window"), ...snapshot.window };
    next["loop"] = { ...section(store, "loop"), ...snapshot.loop };
    next["fps"] = { ...section(store, "fps"), ...snapshot.fps };

    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, `${JSON.stringify(next, null, 2)}\n`, "utf8");
    return true;
  } catch (error) {
    console.warn("Failed to save settings:", error);
    return false;
  }
}

function parseFlag(raw: string): boolean | undefined {
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "off" || v === "no") return false;
  return undefined;
}

function parseNumber(raw: string): number | undefined {
  if (raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

/** Overrides read from `TICKFRAME_*` variables; malformed values are skipped. */
export function settingsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Partial<EngineSettings> {
  const out: MutableSettings = {};
  const title = env["TICKFRAME_TITLE"];
  if (title !== undefined) out.title = title;

  const width = env["TICKFRAME_WIDTH"];
  const w = width === undefined ? undefined : parseNumber(width);
  if (isDimension(w)) out.windowWidth = w;

  const height = env["TICKFRAME_HEIGHT"];
  const h = height === undefined ? undefined : parseNumber(height);
  if (isDimension(h)) out.windowHeight = h;

  const pacing = env["TICKFRAME_PACING_MS"];
  const p = pacing === undefined ? undefined : parseNumber(pacing);
  if (isPacing(p)) out.pacingMs = p;

  const showFps = env["TICKFRAME_SHOW_FPS"];
  const flag = showFps === undefined ? undefined : parseFlag(showFps);
  if (flag !== undefined) out.fpsVisible = flag;

  return out;
}
