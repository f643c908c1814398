import path from "path";
import { DEFAULT_MAX_UPLOAD_BYTES, loadConfig } from "./config";

const ROOT = path.join(__dirname, "..");

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3001,
      dataDir: path.join(ROOT, "data"),
      uploadDir: path.join(ROOT, "data", "uploads", "assignments"),
      maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
      allowSelfEnrollment: false,
      corsOrigins: ["http://localhost:5173", "http://localhost:3000"],
      sessionTtlMs: 12 * 60 * 60 * 1000,
    });
    expect(DEFAULT_MAX_UPLOAD_BYTES).toBe(52428800);
  });

  it("reads values from the environment", () => {
    const config = loadConfig({
      API_PORT: "8080",
      DATA_DIR: "/srv/coursework",
      MAX_UPLOAD_BYTES: "1048576",
      ALLOW_SELF_ENROLLMENT: "Yes",
      CORS_ORIGINS: "https://a.example, https://b.example,",
      SESSION_TTL_HOURS: "1",
    });

    expect(config.port).toBe(8080);
    expect(config.dataDir).toBe("/srv/coursework");
    expect(config.uploadDir).toBe("/srv/coursework/uploads/assignments");
    expect(config.maxUploadBytes).toBe(1048576);
    expect(config.allowSelfEnrollment).toBe(true);
    expect(config.corsOrigins).toEqual(["https://a.example", "https://b.example"]);
    expect(config.sessionTtlMs).toBe(3600000);
  });

  it("keeps a separate upload directory when one is given", () => {
    expect(loadConfig({ UPLOAD_DIR: "/mnt/uploads" }).uploadDir).toBe("/mnt/uploads");
  });

  it("treats anything but a yes-like value as false", () => {
    expect(loadConfig({ ALLOW_SELF_ENROLLMENT: "nope" }).allowSelfEnrollment).toBe(false);
  });

  it("falls back on invalid numbers with a warning", () => {
    const warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadConfig({ MAX_UPLOAD_BYTES: "lots", API_PORT: "-1" });

    expect(config.maxUploadBytes).toBe(DEFAULT_MAX_UPLOAD_BYTES);
    expect(config.port).toBe(3001);
    expect(warnSpy).toHaveBeenCalledWith(
      `[config] Ignoring invalid MAX_UPLOAD_BYTES="lots", using ${DEFAULT_MAX_UPLOAD_BYTES}`
    );
    warnSpy.mockRestore();
  });
});
