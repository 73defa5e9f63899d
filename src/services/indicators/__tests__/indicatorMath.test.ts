import { describe, expect, it } from "vitest";
import {
  buildIndicatorPayload,
  calculateEmaSeries,
  calculateMacdSeries,
  calculateRsiSeries,
  extractOrderedSeries,
  formatIndicatorValue,
  lastDefined,
} from "../indicatorMath";

function candle(ts: number, close: string): string[] {
  return [String(ts), "1", "2", "0.5", close, "100", "10", "1000", "1"];
}

describe("calculateEmaSeries", () => {
  it("seeds with the first value and hides the warm-up prefix", () => {
    expect(calculateEmaSeries([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2.25, 3.125, 4.0625]);
  });

  it("returns an empty series for empty input", () => {
    expect(calculateEmaSeries([], 20)).toEqual([]);
  });

  it("is all null when there are fewer values than the period", () => {
    expect(calculateEmaSeries([1, 2, 3], 20)).toEqual([null, null, null]);
  });
});

describe("calculateMacdSeries", () => {
  it("starts producing values at the 26th observation", () => {
    const values = Array.from({ length: 30 }, (_, idx) => 100 + idx);
    const { dif, signal, histogram } = calculateMacdSeries(values);

    expect(dif).toHaveLength(30);
    expect(dif[24]).toBeNull();
    expect(signal[24]).toBeNull();
    expect(histogram[24]).toBeNull();
    expect(dif[25]).not.toBeNull();
    expect(signal[25]).toBe(dif[25]);
    expect(histogram[25]).toBe(0);
  });

  it("keeps histogram equal to twice the DIF/DEA gap", () => {
    const values = Array.from({ length: 40 }, (_, idx) => 50 + Math.sin(idx / 3) * 5);
    const { dif, signal, histogram } = calculateMacdSeries(values);

    for (let idx = 25; idx < values.length; idx++) {
      const d = dif[idx];
      const s = signal[idx];
      expect(d).not.toBeNull();
      expect(s).not.toBeNull();
      if (d !== null && s !== null) {
        expect(histogram[idx]).toBeCloseTo(2 * (d - s), 12);
      }
    }
  });

  it("is flat for a constant series", () => {
    const { dif, histogram } = calculateMacdSeries(Array.from({ length: 30 }, () => 10));
    expect(dif[29]).toBe(0);
    expect(histogram[29]).toBe(0);
  });

  it("returns empty series for empty input", () => {
    expect(calculateMacdSeries([])).toEqual({ dif: [], signal: [], histogram: [] });
  });
});

describe("calculateRsiSeries", () => {
  it("is 100 when there are no losses", () => {
    const rsi = calculateRsiSeries([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 7);
    expect(rsi.slice(0, 7)).toEqual([null, null, null, null, null, null, null]);
    expect(rsi[7]).toBe(100);
    expect(rsi[9]).toBe(100);
  });

  it("is 100 for a constant series with neither gains nor losses", () => {
    const flat = Array.from({ length: 10 }, () => 10);
    const rsi = calculateRsiSeries(flat, 7);
    expect(rsi).toEqual([null, null, null, null, null, null, null, 100, 100, 100]);

    const ema = calculateEmaSeries(flat, 7);
    expect(ema.slice(0, 6)).toEqual([null, null, null, null, null, null]);
    expect(ema.slice(6)).toEqual([10, 10, 10, 10]);
  });

  it("is 0 when there are no gains", () => {
    const rsi = calculateRsiSeries([10, 9, 8, 7, 6, 5, 4, 3], 7);
    expect(rsi[7]).toBe(0);
  });

  it("averages the first window then applies Wilder smoothing", () => {
    const rsi = calculateRsiSeries([1, 2, 1, 2, 1, 2, 1, 2, 1], 7);
    // 首个窗口: 平均涨幅 4/7, 平均跌幅 3/7
    expect(rsi[7]).toBeCloseTo(400 / 7, 6);
    // 下一根: gain=(4/7*6)/7, loss=(3/7*6+1)/7
    const gain = ((4 / 7) * 6) / 7;
    const loss = ((3 / 7) * 6 + 1) / 7;
    expect(rsi[8]).toBeCloseTo(100 - 100 / (1 + gain / loss), 6);
  });

  it("is all null when the series is shorter than the period", () => {
    expect(calculateRsiSeries([1, 2, 3], 7)).toEqual([null, null, null]);
  });
});

describe("formatIndicatorValue", () => {
  it("keeps up to eight decimals and strips trailing zeros", () => {
    expect(formatIndicatorValue(1.5)).toBe("1.5");
    expect(formatIndicatorValue(100)).toBe("100");
    expect(formatIndicatorValue(0)).toBe("0");
    expect(formatIndicatorValue(0.123456789)).toBe("0.12345679");
    expect(formatIndicatorValue(null)).toBeNull();
  });
});

describe("lastDefined", () => {
  it("skips trailing nulls", () => {
    expect(lastDefined([null, 1, 2, null])).toBe(2);
    expect(lastDefined([null, null])).toBeNull();
  });
});

describe("extractOrderedSeries", () => {
  it("reverses newest-first candles and drops malformed records", () => {
    const raw = [candle(3, "30"), candle(2, "bad"), "junk", ["4", "1"], candle(1, "10")];
    expect(extractOrderedSeries(raw)).toEqual({ timestamps: ["1", "3"], closes: [10, 30] });
  });
});

describe("buildIndicatorPayload", () => {
  it("returns null for empty input or input without valid closes", () => {
    expect(buildIndicatorPayload([])).toBeNull();
    expect(buildIndicatorPayload([candle(1, "x"), "junk"])).toBeNull();
  });

  it("aligns every series with the close series", () => {
    const raw = Array.from({ length: 30 }, (_, idx) => candle(30 - idx, String(130 - idx)));
    const payload = buildIndicatorPayload(raw);

    expect(payload).not.toBeNull();
    if (!payload) return;
    expect(payload.close_series).toHaveLength(30);
    expect(payload.close_series[0]).toBe(101);
    expect(payload.close_series[29]).toBe(130);
    expect(payload.timestamp_series[0]).toBe("1");
    expect(payload.ema20_series).toHaveLength(30);
    expect(payload.macd_series).toHaveLength(30);
    expect(payload.macd_dif_series).toHaveLength(30);
    expect(payload.macd_signal_series).toHaveLength(30);
    expect(payload.rsi7_series).toHaveLength(30);
    expect(payload.rsi7).toBe("100");
    expect(payload.ema20).toBe(formatIndicatorValue(lastDefined(payload.ema20_series)));
    expect(payload.macd).toBe(formatIndicatorValue(lastDefined(payload.macd_series)));
  });

  it("leaves MACD scalars empty while the warm-up is incomplete", () => {
    const raw = Array.from({ length: 10 }, (_, idx) => candle(10 - idx, String(20 - idx)));
    const payload = buildIndicatorPayload(raw);
    expect(payload?.macd).toBeNull();
    expect(payload?.macd_dif).toBeNull();
    expect(payload?.ema20).toBeNull();
    expect(payload?.rsi7).toBe("100");
  });
});
