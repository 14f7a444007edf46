import fs from "fs";
import os from "os";
import path from "path";
import {
  defaultSettings,
  getDefaultAppDir,
  loadSettings,
  normalizeSettings,
  resolveConfigPath,
  saveSettings,
} from "../src/config";

function tempDir() {
  return fs.mkdtempSync(path.join(os.tmpdir(), "ringlink-config-"));
}

describe("config helpers", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("loadSettings returns defaults when the file is missing", () => {
    const configPath = path.join(tempDir(), "config.json");
    const loaded = loadSettings(configPath);

    expect(loaded.settings).toEqual(defaultSettings());
    expect(loaded.fromFile).toBe(false);
    expect(loaded.path).toBe(configPath);
  });

  test("loadSettings falls back to defaults on corrupt JSON", () => {
    const configPath = path.join(tempDir(), "config.json");
    fs.writeFileSync(configPath, "{ not json");
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});

    const loaded = loadSettings(configPath);

    expect(loaded.settings).toEqual(defaultSettings());
    expect(loaded.fromFile).toBe(false);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  test("loadSettings merges partial sections with defaults", () => {
    const configPath = path.join(tempDir(), "config.json");
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        theme: "light",
        ollama: { model: "mistral" },
        activeProvider: "ollama",
        lastBleAddress: " AA:BB:CC:DD:EE:01 ",
        mappings: { noop: ["button_single"] },
      })
    );

    const { settings, fromFile } = loadSettings(configPath);

    expect(fromFile).toBe(true);
    expect(settings).not.toHaveProperty("theme");
    expect(settings.ollama).toEqual({
      baseUrl: "http://127.0.0.1:11434",
      model: "mistral",
      temperature: 0.7,
    });
    expect(settings.openai).toEqual(defaultSettings().openai);
    expect(settings.activeProvider).toBe("ollama");
    expect(settings.lastBleAddress).toBe("AA:BB:CC:DD:EE:01");
    expect(settings.mappings).toEqual({ noop: ["button_single"] });
  });

  test("normalizeSettings clamps temperatures and ignores wrong types", () => {
    const settings = normalizeSettings({
      openai: { apiKey: 42, temperature: 5 },
      ollama: { temperature: -1 },
      openaiCompat: "nope",
      mappings: ["button_single"],
    });

    expect(settings.openai.apiKey).toBe("");
    expect(settings.openai.temperature).toBe(2);
    expect(settings.ollama.temperature).toBe(0);
    expect(settings.openaiCompat).toEqual(defaultSettings().openaiCompat);
    expect(settings.mappings).toEqual(defaultSettings().mappings);
  });

  test("normalizeSettings of a non-object is the defaults", () => {
    expect(normalizeSettings(null)).toEqual(defaultSettings());
    expect(normalizeSettings([1, 2])).toEqual(defaultSettings());
  });

  test("saveSettings creates the directory and writes pretty JSON", async () => {
    const configPath = path.join(tempDir(), "nested", "dir", "config.json");
    const settings = { ...defaultSettings(), activeProvider: "ollama" };

    await saveSettings(configPath, settings);

    const text = fs.readFileSync(configPath, "utf8");
    expect(text).toBe(`${JSON.stringify(settings, null, 2)}\n`);
    expect(loadSettings(configPath).settings).toEqual(settings);
  });

  test("getDefaultAppDir prefers APPDATA", () => {
    expect(getDefaultAppDir({ APPDATA: "C:\\Users\\me\\AppData\\Roaming" })).toBe(
      path.join("C:\\Users\\me\\AppData\\Roaming", "RingLink")
    );
    expect(getDefaultAppDir({})).toBe(path.join(os.homedir(), ".ringlink"));
  });

  test("resolveConfigPath uses the override or the app dir", () => {
    expect(resolveConfigPath("./conf/local.json", {})).toBe(path.resolve("./conf/local.json"));
    expect(resolveConfigPath(undefined, {})).toBe(path.join(os.homedir(), ".ringlink", "config.json"));
  });
});
