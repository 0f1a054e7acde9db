import { describe, it, expect } from "vitest";
import { loadConfig, resolveEmailCredentials } from "../src/config/index.js";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const cfg = loadConfig({});
    expect(cfg.alertThresholdPct).toBe(5);
    expect(cfg.reportSchedule).toBe("05:00");
    expect(cfg.email).toEqual({
      sender: "",
      receiver: "",
      passwordEnv: "SMTP_PASSWORD",
      smtpHost: "smtp.gmail.com",
      smtpPort: 465,
    });
    expect(cfg.market).toEqual({ symbolSuffix: "", timeoutMs: 10_000 });
    expect(cfg.synthetic.seed).toBe(42);
    expect(cfg.dataDir).toBe("data");
    expect(cfg.port).toBe(3000);
  });

  it("should coerce numeric variables", () => {
    const cfg = loadConfig({ ALERT_THRESHOLD_PCT: "7.5", SMTP_PORT: "587", SYNTHETIC_SEED: "7" });
    expect(cfg.alertThresholdPct).toBe(7.5);
    expect(cfg.email.smtpPort).toBe(587);
    expect(cfg.synthetic.seed).toBe(7);
  });

  it("should treat blank values as unset", () => {
    expect(loadConfig({ REPORT_SCHEDULE: "  ", SYMBOL_SUFFIX: "" }).reportSchedule).toBe("05:00");
  });

  it("should reject invalid values", () => {
    expect(() => loadConfig({ REPORT_SCHEDULE: "25:00" })).toThrow("REPORT_SCHEDULE must be HH:mm");
    expect(() => loadConfig({ ALERT_THRESHOLD_PCT: "-1" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });
});

describe("resolveEmailCredentials", () => {
  const cfg = loadConfig({ EMAIL_SENDER: "tracker@example.com", EMAIL_RECEIVER: "owner@example.com" });

  it("should read the password from the referenced variable", () => {
    expect(resolveEmailCredentials(cfg, { SMTP_PASSWORD: "test-secret" })).toEqual({
      user: "tracker@example.com",
      pass: "test-secret",
      receiver: "owner@example.com",
    });
  });

  it("should return null when any part is missing", () => {
    expect(resolveEmailCredentials(cfg, {})).toBeNull();
    expect(resolveEmailCredentials(loadConfig({}), { SMTP_PASSWORD: "test-secret" })).toBeNull();
  });
});
