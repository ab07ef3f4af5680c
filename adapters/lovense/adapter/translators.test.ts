/**
 * Translator Tests
 * Desired state → vendor command, host commands → partial settings,
 * and the host-observable state of every facet.
 */

import { describe, it, expect } from "vitest";
import { ConfigError } from "./errors.js";
import {
  accessoryToConnectivity,
  accessoryToRegistration,
  bridgeToState,
  brightnessToLevel,
  describeVendorCode,
  patternCommand,
  positionCommandToSettings,
  presetCommand,
  strokeCommandToSettings,
  strokeToState,
  thrustingCommandToSettings,
  toCommandBody,
  translate,
  vibrationCommandToAction,
  vibrationToState,
} from "./translators.js";
import type { Accessory, DesiredState } from "./types.js";

const idle: DesiredState = { vibration: 0, thrusting: 0 };

function accessory(overrides: Partial<Accessory> = {}): Accessory {
  return {
    id: "t1",
    name: "Max",
    displayName: "Max",
    toyType: "max",
    connected: true,
    functions: ["Vibrate"],
    ...overrides,
  };
}

describe("translate", () => {
  it("stops when nothing is active", () => {
    expect(translate(idle)).toEqual({ command: "Function", action: "Stop", timeSec: 0 });
  });

  it("joins active sub-actions in vibrate, stroke, thrusting order", () => {
    expect(translate({ vibration: 12, strokeRange: [10, 80], thrusting: 4 })).toEqual({
      command: "Function",
      action: "Vibrate:12,Stroke:10-80,Thrusting:4",
      timeSec: 0,
    });
  });

  it("leaves out zero intensities", () => {
    expect(translate({ vibration: 0, strokeRange: [10, 80], thrusting: 0 })).toEqual({
      command: "Function",
      action: "Stroke:10-80",
      timeSec: 0,
    });
  });

  it("sends Position whenever a position is set", () => {
    const state: DesiredState = { vibration: 12, position: 55, strokeRange: [10, 80], thrusting: 20 };
    expect(translate(state)).toEqual({ command: "Position", value: "55" });
  });

  it("leaves the stroke out when no range is set", () => {
    expect(translate({ vibration: 5, thrusting: 3 })).toEqual({
      command: "Function",
      action: "Vibrate:5,Thrusting:3",
      timeSec: 0,
    });
  });

  it("is deterministic", () => {
    const state: DesiredState = { vibration: 7, strokeRange: [20, 30], thrusting: 0 };
    expect(JSON.stringify(translate(state))).toBe(JSON.stringify(translate({ ...state })));
  });
});

describe("toCommandBody", () => {
  it("produces the local wire body for a Function command", () => {
    const body = toCommandBody(translate({ vibration: 12, strokeRange: [10, 80], thrusting: 0 }), "t1");
    expect(JSON.stringify(body)).toBe(
      '{"command":"Function","action":"Vibrate:12,Stroke:10-80","timeSec":0,"toy":"t1","apiVer":1}',
    );
  });

  it("produces the local wire body for a Position command", () => {
    const body = toCommandBody(translate({ vibration: 12, position: 55, thrusting: 0 }), "t1");
    expect(JSON.stringify(body)).toBe('{"command":"Position","value":"55","toy":"t1","apiVer":1}');
  });

  it("uses api version 2 for patterns and omits toy when not given", () => {
    expect(toCommandBody(patternCommand([5]))).toEqual({
      command: "Pattern",
      rule: "V:1;F:v;S:1000#",
      strength: "5",
      timeSec: 10,
      apiVer: 2,
    });
  });
});

describe("patternCommand / presetCommand", () => {
  it("clamps interval, strengths and duration", () => {
    expect(patternCommand([20, 25, -3, 5], 50, 400)).toEqual({
      command: "Pattern",
      rule: "V:1;F:v;S:100#",
      strength: "20;20;0;5",
      timeSec: 300,
    });
  });

  it("builds a preset that runs until stopped", () => {
    expect(presetCommand("wave")).toEqual({ command: "Preset", name: "wave", timeSec: 0 });
  });
});

describe("describeVendorCode", () => {
  it("names known codes", () => {
    expect(describeVendorCode(402)).toBe("Toy Not Connected");
    expect(describeVendorCode(507)).toBe("Lovense APP is Offline");
  });

  it("falls back for unknown codes", () => {
    expect(describeVendorCode(999)).toBe("Unknown error code: 999");
  });
});

describe("vibrationCommandToAction", () => {
  it("clamps an explicit level", () => {
    expect(vibrationCommandToAction({ level: 25 }, idle)).toEqual({ kind: "settings", settings: { vibration: 20 } });
  });

  it("converts brightness so any non-zero value vibrates", () => {
    expect(brightnessToLevel(0)).toBe(0);
    expect(brightnessToLevel(1)).toBe(1);
    expect(brightnessToLevel(128)).toBe(10);
    expect(brightnessToLevel(255)).toBe(20);
    expect(vibrationCommandToAction({ brightness: 255 }, idle)).toEqual({ kind: "settings", settings: { vibration: 20 } });
  });

  it("turns off even when a level is also given", () => {
    expect(vibrationCommandToAction({ on: false, level: 5 }, idle)).toEqual({ kind: "settings", settings: { vibration: 0 } });
  });

  it("keeps the stored level on a bare on:true, else uses the maximum", () => {
    expect(vibrationCommandToAction({ on: true }, { vibration: 7, thrusting: 0 }))
      .toEqual({ kind: "settings", settings: { vibration: 7 } });
    expect(vibrationCommandToAction({ on: true }, idle))
      .toEqual({ kind: "settings", settings: { vibration: 20 } });
  });

  it("recognizes presets and patterns", () => {
    expect(vibrationCommandToAction({ preset: "pulse" }, idle)).toEqual({ kind: "preset", name: "pulse" });
    expect(vibrationCommandToAction({ pattern: "5;10", interval: 500 }, idle)).toEqual({
      kind: "pattern",
      strengths: [5, 10],
      intervalMs: 500,
      durationSec: undefined,
    });
  });

  it("rejects empty and unknown commands", () => {
    expect(() => vibrationCommandToAction({}, idle)).toThrow(ConfigError);
    expect(() => vibrationCommandToAction({ preset: "disco" }, idle)).toThrow(ConfigError);
    expect(() => vibrationCommandToAction({ pattern: "5,10" }, idle)).toThrow(ConfigError);
  });
});

describe("positionCommandToSettings / thrustingCommandToSettings", () => {
  it("clamps a position and passes null through as a clear", () => {
    expect(positionCommandToSettings({ value: 120 })).toEqual({ position: 100 });
    expect(positionCommandToSettings({ value: null })).toEqual({ position: null });
  });

  it("requires a value", () => {
    expect(() => positionCommandToSettings({})).toThrow(ConfigError);
  });

  it("clamps thrusting", () => {
    expect(thrustingCommandToSettings({ level: -4 })).toEqual({ thrusting: 0 });
  });
});

describe("strokeCommandToSettings", () => {
  it("takes the missing side from the defaults", () => {
    expect(strokeCommandToSettings({ top: 60 }, undefined)).toEqual({ strokeRange: [25, 60] });
  });

  it("takes the missing side from the stored range", () => {
    expect(strokeCommandToSettings({ bottom: 30 }, [10, 50])).toEqual({ strokeRange: [30, 50] });
  });

  it("moves top above bottom when top was set too low", () => {
    expect(strokeCommandToSettings({ top: 5 }, [10, 50])).toEqual({ strokeRange: [10, 11] });
  });

  it("moves bottom below top when bottom was set too high", () => {
    expect(strokeCommandToSettings({ bottom: 80 }, [10, 50])).toEqual({ strokeRange: [49, 50] });
  });

  it("rejects an inverted range when both sides are given", () => {
    expect(() => strokeCommandToSettings({ top: 20, bottom: 30 }, undefined)).toThrow(ConfigError);
  });

  it("clears", () => {
    expect(strokeCommandToSettings({ clear: true }, [10, 50])).toEqual({ strokeRange: null });
  });

  it("rejects a command without any field", () => {
    expect(() => strokeCommandToSettings({}, undefined)).toThrow(ConfigError);
  });
});

describe("state mappers", () => {
  it("reports vibration on a light-style scale as well", () => {
    expect(vibrationToState({ vibration: 10, thrusting: 0 })).toEqual({ on: true, level: 10, brightness: 128 });
  });

  it("reports the default stroke range when inactive", () => {
    expect(strokeToState(idle)).toEqual({ active: false, bottom: 25, top: 75 });
  });

  it("reports connectivity", () => {
    expect(accessoryToConnectivity(accessory({ connected: false, firmwareVersion: "241" }))).toEqual({
      connected: false,
      status: "disconnected",
      toy_type: "max",
      firmware_version: "241",
    });
  });

  it("reports the bridge before pairing", () => {
    expect(bridgeToState("unpaired", null, null)).toEqual({
      state: "unpaired",
      domain: null,
      https_port: null,
      qr_code: null,
      code: null,
    });
  });
});

describe("accessoryToRegistration", () => {
  it("registers only vibration and the read-only facets for a plain vibrator", () => {
    const reg = accessoryToRegistration(accessory());
    expect(reg.entityId).toBe("t1");
    expect(reg.properties.map((p) => p.property)).toEqual(["vibration", "battery", "connectivity"]);
    expect(reg.properties.filter((p) => p.readOnly).map((p) => p.property)).toEqual(["battery", "connectivity"]);
  });

  it("adds position, stroke and thrusting for a capable stroker", () => {
    const reg = accessoryToRegistration(accessory({ toyType: "solace", functions: ["Thrusting", "Stroke"] }));
    expect(reg.properties.map((p) => p.property)).toEqual([
      "vibration",
      "position",
      "stroke",
      "thrusting",
      "battery",
      "connectivity",
    ]);
  });
});
