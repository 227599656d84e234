import { describe, expect, it } from "vitest";
import { INVARIANT_CULTURE } from "../domain/culture.js";
import { ValidationError } from "../domain/errors.js";
import { loadConfig } from "./deps.js";

describe("loadConfig", () => {
  it("defaults to port 3000 and the invariant culture", () => {
    expect(loadConfig({})).toEqual({ port: 3000, locale: null, culture: INVARIANT_CULTURE });
  });

  it("reads PORT and DURATION_LOCALE", () => {
    const config = loadConfig({ PORT: "8080", DURATION_LOCALE: "de-DE" });
    expect(config.port).toBe(8080);
    expect(config.locale).toBe("de-DE");
    expect(config.culture.numberDecimalSeparator).toBe(",");
  });

  it("rejects a PORT that is not a port number", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow(ValidationError);
    expect(() => loadConfig({ PORT: "70000" })).toThrow(ValidationError);
  });

  it("rejects a DURATION_LOCALE that is not a locale tag", () => {
    expect(() => loadConfig({ DURATION_LOCALE: "not_a locale" })).toThrow(ValidationError);
  });
});
