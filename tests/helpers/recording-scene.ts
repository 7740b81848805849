import { Scene } from "../../src/scene/scene";

import type { Keyboard } from "../../src/device/keyboard";
import type { DrawHandle } from "../../src/render/surface";

/** Scene that appends `<name>.<hook>` to a shared log for every hook call. */
export class RecordingScene extends Scene {
  readonly seenDt: Array<number> = [];

  constructor(
    name: string | null,
    private readonly log: Array<string>,
  ) {
    super(name);
  }

  private record(hook: string): void {
    this.log.push(`${this.getName() ?? "?"}.${hook}`);
  }

  load(): void {
    this.record("load");
  }

  unload(): void {
    this.record("unload");
  }

  enter(): void {
    this.record("enter");
  }

  exit(): void {
    this.record("exit");
  }

  processInputs(dt: number, _keyboard: Keyboard): void {
    this.seenDt.push(dt);
    this.record("processInputs");
  }

  update(dt: number): void {
    this.seenDt.push(dt);
    this.record("update");
  }

  render(_handle: DrawHandle): void {
    this.record("render");
  }

  onShutDown(): void {
    this.record("onShutDown");
  }
}
