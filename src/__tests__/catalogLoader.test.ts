import {
  buildCatalog,
  buildSportKeywordTable,
  findUncataloguedSports,
  loadStaticData,
} from "../loaders/catalogLoader";
import { ConfigError } from "../utils/errors";

describe("buildCatalog", () => {
  it("normalizes labels and keeps exercise order", () => {
    const catalog = buildCatalog([
      { label: " Full Body ", exercises: ["Burpee", "Swing"] },
      { label: "LEGS", exercises: ["Squat"] },
    ]);

    expect(catalog.keys()).toEqual(["full body", "legs"]);
    expect(catalog.get("full body")).toEqual(["Burpee", "Swing"]);
  });

  it("freezes every entry", () => {
    const catalog = buildCatalog([{ label: "full body", exercises: ["Burpee"] }]);
    expect(Object.isFrozen(catalog.get("full body"))).toBe(true);
  });

  it("exposes no way to change the catalog", () => {
    const catalog = buildCatalog([{ label: "full body", exercises: ["Burpee"] }]);

    expect(Object.isFrozen(catalog)).toBe(true);
    expect("set" in catalog).toBe(false);
    expect("delete" in catalog).toBe(false);
    expect("clear" in catalog).toBe(false);

    const keys = catalog.keys();
    keys.push("legs");
    expect(catalog.keys()).toEqual(["full body"]);
    expect(catalog.size).toBe(1);
  });

  it("requires the full body entry", () => {
    expect(() => buildCatalog([{ label: "legs", exercises: ["Squat"] }])).toThrow(
      'Exercise catalog must contain the "full body" entry'
    );
  });

  it("rejects duplicate labels after normalization", () => {
    expect(() =>
      buildCatalog([
        { label: "full body", exercises: ["Burpee"] },
        { label: "Full Body", exercises: ["Swing"] },
      ])
    ).toThrow('Duplicate exercise catalog label: "full body"');
  });

  it("rejects entries without exercises", () => {
    expect(() => buildCatalog([{ label: "full body", exercises: [] }])).toThrow(ConfigError);
  });
});

describe("buildSportKeywordTable", () => {
  it("keeps declaration order and lowercases keywords", () => {
    const table = buildSportKeywordTable([
      { sport: "Soccer", keywords: ["FOOTBALL"] },
      { sport: "basketball", keywords: ["Hoops"] },
    ]);

    expect(table).toEqual([
      { sport: "soccer", keywords: ["football"] },
      { sport: "basketball", keywords: ["hoops"] },
    ]);
    expect(Object.isFrozen(table)).toBe(true);
  });

  it("rejects a sport listed twice", () => {
    expect(() =>
      buildSportKeywordTable([
        { sport: "tennis", keywords: ["tennis"] },
        { sport: "Tennis", keywords: ["racket"] },
      ])
    ).toThrow('Duplicate sport in keyword table: "tennis"');
  });
});

describe("findUncataloguedSports", () => {
  it("lists sports the catalog cannot sample from", () => {
    const catalog = buildCatalog([
      { label: "full body", exercises: ["Burpee"] },
      { label: "tennis", exercises: ["Pallof Press"] },
    ]);
    const table = buildSportKeywordTable([
      { sport: "tennis", keywords: ["tennis"] },
      { sport: "rowing", keywords: ["rowing"] },
    ]);

    expect(findUncataloguedSports(table, catalog)).toEqual(["rowing"]);
  });
});

describe("loadStaticData", () => {
  it("loads the shipped catalog with every detectable sport", () => {
    const { catalog, sportKeywords } = loadStaticData();

    expect(catalog.keys()).toEqual([
      "legs",
      "upper body",
      "core",
      "full body",
      "basketball",
      "soccer",
      "running",
      "tennis",
      "volleyball",
    ]);
    expect(sportKeywords.map((s) => s.sport)).toEqual([
      "basketball",
      "soccer",
      "running",
      "tennis",
      "volleyball",
    ]);
    expect(findUncataloguedSports(sportKeywords, catalog)).toEqual([]);
  });

  it("fails with a ConfigError when the data directory is missing", () => {
    expect(() => loadStaticData("/nonexistent-gameplan-data")).toThrow(ConfigError);
  });
});
