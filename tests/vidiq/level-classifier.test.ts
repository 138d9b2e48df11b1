/**
 * 難易度レベル判定のテスト
 */

import { LEVEL_BANDS, classifyLevel, classifyMetric } from "../../src/vidiq/level-classifier";

describe("classifyLevel", () => {
  it.each([
    [0, "Very Low"],
    [20, "Very Low"],
    [21, "Low"],
    [40, "Low"],
    [41, "Medium"],
    [60, "Medium"],
    [61, "High"],
    [80, "High"],
    [81, "Very High"],
    [100, "Very High"],
  ])("スコア %p は %p", (score, expected) => {
    expect(classifyLevel(score)).toBe(expected);
  });

  it("しきい値は上限を含み、小数は次の帯になる", () => {
    expect(classifyLevel(20.5)).toBe("Low");
    expect(classifyLevel(80.01)).toBe("Very High");
  });

  it("範囲外の値も両端の帯になる", () => {
    expect(classifyLevel(-5)).toBe("Very Low");
    expect(classifyLevel(150)).toBe("Very High");
  });

  it("スコアが大きいほどレベルは下がらない", () => {
    let previous = 0;
    for (let score = 0; score <= 100; score++) {
      const rank = LEVEL_BANDS.indexOf(classifyLevel(score));
      expect(rank).toBeGreaterThanOrEqual(previous);
      previous = rank;
    }
  });
});

describe("classifyMetric", () => {
  it("N/A はそのまま返す", () => {
    expect(classifyMetric("N/A")).toBe("N/A");
  });

  it("数値はレベルに変換する", () => {
    expect(classifyMetric(50)).toBe("Medium");
  });
});
