import { describe, expect, it } from "vitest";

import type { ToolDescriptor } from "../../tools/types.js";
import { KeywordScorer } from "../keywordScorer.js";
import { buildLexicon, defaultLexicon, stem } from "../lexicon.js";
import { splitWords, terms } from "../text.js";

const listAlphas: ToolDescriptor = {
  name: "list_alphas",
  description: "List all alphas that belong to an owner",
  parameterSchema: { owner: { type: "string", required: true, description: "" } },
};

const listBetas: ToolDescriptor = {
  name: "list_betas",
  description: "List all betas that belong to an owner",
  parameterSchema: { owner: { type: "string", required: true, description: "" } },
};

const getWeather: ToolDescriptor = {
  name: "get_weather",
  description: "Current weather forecast for a city",
  parameterSchema: { city: { type: "string", required: true, description: "" } },
};

describe("stem", () => {
  it("strips plural and verb endings", () => {
    expect(stem("alphas")).toBe("alpha");
    expect(stem("cities")).toBe("city");
    expect(stem("boxes")).toBe("box");
    expect(stem("owned")).toBe("own");
    expect(stem("listing")).toBe("list");
    expect(stem("listed")).toBe("list");
  });

  it("leaves short words and -ss/-us/-is endings alone", () => {
    expect(stem("bus")).toBe("bus");
    expect(stem("status")).toBe("status");
    expect(stem("class")).toBe("class");
    expect(stem("analysis")).toBe("analysis");
  });
});

describe("text", () => {
  it("splits snake, kebab and camel case", () => {
    expect(splitWords("list_alphas getWeather send-mail")).toEqual(["list", "alphas", "get", "weather", "send", "mail"]);
  });

  it("drops stop words and folds synonyms", () => {
    expect(terms("Give me all my alphas owned by me", defaultLexicon())).toEqual(["list", "alpha", "owner"]);
  });

  it("builds a lexicon from plain data", () => {
    const lexicon = buildLexicon({
      stopWords: ["The"],
      synonyms: { find: ["Lookups", "seek"] },
      selfReferences: [],
      identityParameters: [],
    });

    expect(terms("the lookups seek", lexicon)).toEqual(["find", "find"]);
  });
});

describe("KeywordScorer", () => {
  const scorer = new KeywordScorer();

  it("weighs name hits over description hits", () => {
    expect(scorer.score("Give me all my alphas owned by me", listAlphas)).toBeCloseTo(2.5 / 3, 10);
    expect(scorer.score("Give me all my alphas owned by me", listBetas)).toBeCloseTo(1.5 / 3, 10);
  });

  it("scores zero for unrelated prompts", () => {
    expect(scorer.score("what time is it in Tokyo", listAlphas)).toBe(0);
  });

  it("scores zero for a prompt of only stop words", () => {
    expect(scorer.score("can you do it for me", listAlphas)).toBe(0);
  });

  it("counts parameter names as description terms", () => {
    // weather (name) = 1, city (parameter) = 0.5, paris = 0
    expect(scorer.score("weather by city Paris", getWeather)).toBeCloseTo(1.5 / 3, 10);
  });

  it("is deterministic", () => {
    const a = scorer.score("show my alphas", listAlphas);
    const b = scorer.score("show my alphas", listAlphas);

    expect(a).toBe(b);
    expect(a).toBe(1);
  });
});
