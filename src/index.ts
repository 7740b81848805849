// Public surface of the engine

export { Vector, EPSILON } from "./math/vector";
export { Bounds } from "./math/bounds";

export { Keyboard } from "./device/keyboard";
export {
  ALT_MASK,
  CTRL_MASK,
  KEYS,
  META_MASK,
  MOUSE_BUTTON1_MASK,
  MOUSE_BUTTON2_MASK,
  MOUSE_BUTTON3_MASK,
  MOUSE_BUTTON4_MASK,
  MOUSE_BUTTON5_MASK,
  SHIFT_MASK,
  isModifierKey,
  keyNameOf,
} from "./device/keys";
export { ScriptedKeySource, attachKeyboard, modifiersOf } from "./device/adapter";

export { MonotonicClock, SimulatedClock } from "./runtime/clock";
export { Time, TIME_UNAVAILABLE } from "./runtime/time";
export {
  DEFAULT_WINDOW_HEIGHT,
  DEFAULT_WINDOW_WIDTH,
  Screen,
} from "./runtime/screen";
export { renderFrame } from "./runtime/render-frame";
export { Game } from "./runtime/game";

export { Scene } from "./scene/scene";
export { SceneController } from "./scene/scene-controller";

export { withDrawHandle } from "./render/surface";
export { MemorySurface } from "./render/memory-surface";

export { HeadlessWindow } from "./window/headless-window";

export { GameObject } from "./entity/game-object";
export {
  Animation,
  DEFAULT_FRAME_DURATION,
  isAnimationMode,
} from "./gfx/animation";
export { createImageLoader } from "./assets/image-loader";
export {
  LOOP_CONTINUOUSLY,
  MAX_DECIBELS,
  MIN_DECIBELS,
  Sound,
  decibelsToLinear,
  linearToDecibels,
} from "./audio/sound";

export {
  DEFAULT_SETTINGS,
  loadSettings,
  parseSettings,
  resolveSettings,
  saveSettings,
  settingsFromEnv,
} from "./config/settings";
export { TRANSPARENT, createColor, rgba } from "./types/brands";
export { setDebugTopics } from "./utils/debug";

export type { KeyName } from "./device/keys";
export type {
  KeyEventLike,
  KeyEventListener,
  KeyEventTarget,
  KeyEventType,
} from "./device/adapter";
export type { Clock } from "./runtime/clock";
export type { RenderStats } from "./runtime/render-frame";
export type { GameOptions, SleepFn } from "./runtime/game";
export type { ScreenSizeListener } from "./runtime/screen";
export type {
  SceneLifecycleEvent,
  SceneLifecycleState,
} from "./scene/lifecycle.machine";
export type { DrawHandle, SurfaceProvider, TextStyle } from "./render/surface";
export type { TextRun } from "./render/memory-surface";
export type {
  CloseListener,
  ResizeListener,
  Unsubscribe,
  WindowHost,
} from "./window/window-host";
export type { AnimationMode } from "./gfx/animation";
export type {
  ImageDecoder,
  ImageLoader,
  ImageLoaderDeps,
  ImageResource,
} from "./assets/image-loader";
export type {
  AudioBackend,
  AudioClip,
  GainControl,
  MuteControl,
} from "./audio/sound";
export type { EngineSettings } from "./config/settings";
export type { Color, FrameIndex, KeyCode, Seconds } from "./types/brands";
export type { Timestamp } from "./types/timestamp";
export type { DebugTopic } from "./utils/debug";
