import { PROVIDERS } from "../providers";
import { UnknownSourceError, loadRegistry, normalize, resolveSourceId, resolveSources } from "../resolve";

describe("Source registry", () => {
  it("should have a provider for every registry entry", () => {
    expect(loadRegistry().every(e => PROVIDERS.has(e.id))).toBe(true);
  });

  it("should normalize case, spacing and dash variants", () => {
    expect(normalize("  Gold–API ")).toBe("gold-api");
    expect(normalize("Metals_Live")).toBe("metals-live");
  });

  it("should resolve names and aliases in order", () => {
    expect(resolveSources("GoldAPI.io, yahoo").map(e => e.id)).toEqual(["goldapi-io", "yahoo-futures"]);
  });

  it("should drop duplicates", () => {
    expect(resolveSources(["metals.live", "metals-live", "Metals_Live"]).map(e => e.id)).toEqual(["metals-live"]);
  });

  it("should ignore empty names", () => {
    expect(resolveSources("gold-api-com,,").map(e => e.id)).toEqual(["gold-api-com"]);
  });

  it("should carry per-source timeouts", () => {
    expect(resolveSources("metals-live")[0].timeout_ms).toBe(8000);
  });

  it("should throw on an unknown source", () => {
    expect(() => resolveSources("gold-api-com,nope")).toThrow(UnknownSourceError);
    expect(() => resolveSources("nope")).toThrow("unknown_source: nope");
  });

  it("should resolve a single id", () => {
    expect(resolveSourceId("GoldPrice.org")).toBe("goldprice-org");
  });
});
