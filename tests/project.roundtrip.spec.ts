import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createProjectStore } from "../src/state/projectStore";
import { BUILTIN_TEMPLATES } from "../src/core/library/templates";
import { saveProjectFile } from "../src/lib/io/projectFile";
import { ErrorCode } from "../src/core/contracts/project";
import { getAll, resetMetrics } from "../src/lib/metrics";
import type { PlannerConfig } from "../src/lib/env";

const config: PlannerConfig = { gridSizeMm: 10, historyLimit: 50, snapToGrid: true, debug: false };

describe("project file round trip through the store", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "wardrobe-roundtrip-"));
    resetMetrics();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("every built-in template survives save then open", () => {
    const store = createProjectStore({ config });
    BUILTIN_TEMPLATES.forEach((t, i) => {
      const res = store.getState().addFromTemplate(t.name, { x: 20 + i * 100, y: 100 });
      expect(res.ok).toBe(true);
    });
    store.getState().setMetadata({ projectName: "Hall", clientName: "A. Client" });
    store.getState().setZoom(1.5);

    const saved = store.getState().saveFile(join(dir, "hall"));
    expect(saved).toEqual({
      ok: true,
      value: {
        path: join(dir, "hall.wdp"),
        message: `Project saved to ${join(dir, "hall.wdp")}`,
        modifiedDate: store.getState().project.metadata.modifiedDate,
      },
    });

    const other = createProjectStore({ config });
    const opened = other.getState().openFile(join(dir, "hall.wdp"));
    expect(opened.ok).toBe(true);
    expect(other.getState().project).toEqual(store.getState().project);

    expect(getAll()).toEqual({
      "project_file_total{op=save,outcome=ok}": 1,
      "project_file_total{op=load,outcome=ok}": 1,
      project_components: 11,
    });
  });

  it("the published project saves directly and the store applies the saved date", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2025-03-01T08:00:00.000Z"));
    const store = createProjectStore({ config });
    store.getState().addFromTemplate("Standard Shelf");
    const published = store.getState().project;

    vi.setSystemTime(new Date("2025-03-02T08:00:00.000Z"));
    const direct = saveProjectFile(published, join(dir, "direct"));
    expect(direct.ok ? direct.value.modifiedDate : direct.error.code).toBe("2025-03-02T08:00:00.000Z");
    expect(store.getState().project).toBe(published);
    expect(published.metadata.modifiedDate).toBe("2025-03-01T08:00:00.000Z");

    vi.setSystemTime(new Date("2025-03-03T08:00:00.000Z"));
    const viaStore = store.getState().saveFile(join(dir, "via-store"));
    expect(viaStore.ok).toBe(true);
    expect(store.getState().project.metadata.modifiedDate).toBe("2025-03-03T08:00:00.000Z");
    expect(store.getState().ui.history.past).toHaveLength(1);
  });

  it("writes snake_case keys and the component tags in z-order", () => {
    const store = createProjectStore({ config });
    store.getState().addFromTemplate("4-Drawer Unit");
    store.getState().addFromTemplate("Double Hanging");
    store.getState().addFromTemplate("Wide Shelf");
    store.getState().addFromTemplate("Lift-Up Overhead");
    store.getState().saveFile(join(dir, "tags.wdp"));

    const doc: unknown = JSON.parse(readFileSync(join(dir, "tags.wdp"), "utf-8"));
    expect(doc).toMatchObject({
      version: "1.0",
      unit_system: "METRIC",
      frame: { width: 4800, height: 2400, depth: 600, panel_thickness: 18, top_clearance: 50, base_height: 100 },
      view_state: { zoom_level: 1, scroll_position: [0, 0] },
      components: [
        { component_type: "DRAWER_UNIT", drawer_count: 4 },
        { component_type: "HANGING_SPACE", rail_type: "double" },
        { component_type: "SHELF" },
        { component_type: "OVERHEAD", door_type: "lift_up" },
      ],
    });
  });

  it("an unknown component tag is kept as a plain component and written back", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = createProjectStore({ config });
    store.getState().addFromTemplate("Standard Shelf");
    const file = store.getState().toFile();
    const doc = { ...file, components: [{ ...file.components[0], component_type: "WARDROBE_LIGHT" }] };
    writeFileSync(join(dir, "light.wdp"), JSON.stringify(doc), "utf-8");

    const other = createProjectStore({ config });
    expect(other.getState().openFile(join(dir, "light.wdp")).ok).toBe(true);
    const [light] = other.getState().project.components;
    if (light.componentType !== "UNKNOWN") throw new Error("expected a plain component");
    expect(light.sourceType).toBe("WARDROBE_LIGHT");
    expect(warn).toHaveBeenCalledTimes(1);

    other.getState().saveFile(join(dir, "light.wdp"));
    expect(existsSync(join(dir, "light.wdp.bak"))).toBe(true);
    const written: unknown = JSON.parse(readFileSync(join(dir, "light.wdp"), "utf-8"));
    expect(written).toMatchObject({ components: [{ component_type: "WARDROBE_LIGHT", name: "Standard Shelf" }] });
  });

  it("a rejected file leaves the open project in place", () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    writeFileSync(join(dir, "old.wdp"), JSON.stringify({ version: "0.9" }), "utf-8");

    const store = createProjectStore({ config });
    store.getState().addFromTemplate("Standard Shelf");
    const before = store.getState().project;

    const res = store.getState().openFile(join(dir, "old.wdp"));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe(ErrorCode.UnsupportedVersion);
    expect(store.getState().project).toBe(before);

    const missing = store.getState().openFile(join(dir, "nope.wdp"));
    expect(missing.ok ? undefined : missing.error.code).toBe(ErrorCode.NotFound);
    expect(getAll()).toEqual({
      "project_file_total{op=load,outcome=UnsupportedVersion}": 1,
      "project_file_total{op=load,outcome=NotFound}": 1,
    });
  });
});
