import { describe, it, expect } from "vitest";
import {
  createColorModel,
  parseColorStyle,
  parseLightnessPolicy,
  srgbDecode,
  srgbEncode,
} from "./color-model.js";
import { ValidationError } from "../errors.js";

describe("createColorModel", () => {
  describe("gamma", () => {
    it("is the identity when gamma is 1", () => {
      const model = createColorModel();

      expect(model.gamma(0.5)).toBe(0.5);
      expect(model.inverseGamma(0.5)).toBe(0.5);
    });

    it("raises to the gamma exponent", () => {
      const model = createColorModel({ gamma: 2 });

      expect(model.gamma(0.5)).toBe(0.25);
      expect(model.gamma(0)).toBe(0);
      expect(model.gamma(1)).toBe(1);
    });

    it("inverts with the reciprocal exponent", () => {
      const model = createColorModel({ gamma: 2 });

      expect(model.inverseGamma(0.25)).toBe(0.5);
    });

    it("handles gamma below one", () => {
      const model = createColorModel({ gamma: 0.5 });

      expect(model.gamma(0.5)).toBeCloseTo(Math.SQRT1_2, 10);
      expect(model.inverseGamma(Math.SQRT1_2)).toBeCloseTo(0.5, 10);
    });

    it("rejects non-positive gamma", () => {
      expect(() => createColorModel({ gamma: 0 })).toThrow(ValidationError);
    });

    it("rejects non-positive balance entries", () => {
      expect(() => createColorModel({ balance: [1, 0, 1] })).toThrow(ValidationError);
    });
  });

  describe("sRGB transfer", () => {
    it("uses the linear segment below the encode threshold", () => {
      expect(srgbEncode(0.003)).toBe(0.003 * 12.92);
      expect(srgbEncode(0)).toBe(0);
    });

    it("uses the linear segment below the decode threshold", () => {
      expect(srgbDecode(0.003)).toBe(0.003 / 12.92);
      expect(srgbDecode(0)).toBe(0);
    });

    it("uses the power segment above the thresholds", () => {
      expect(srgbEncode(0.5)).toBeCloseTo(Math.pow(0.5, 1 / 2.4) * 1.055 - 0.055, 10);
      expect(srgbDecode(0.5)).toBeCloseTo(Math.pow(0.555 / 1.055, 2.4), 10);
    });

    it("decodes what it encodes", () => {
      expect(srgbDecode(srgbEncode(0.2))).toBeCloseTo(0.2, 10);
    });
  });

  describe("colorBrightness", () => {
    it("weights each channel", () => {
      const model = createColorModel({ brightness: [0.1, 0.2, 0.3] });

      expect(model.colorBrightness(0.5, 0.5, 0.5)).toBeCloseTo(0.3, 10);
    });

    it("sums the default weights to one for white", () => {
      const model = createColorModel();

      expect(model.colorBrightness(0, 0, 0)).toBe(0);
      expect(model.colorBrightness(1, 1, 1)).toBeCloseTo(1, 10);
    });
  });

  describe("rgbColor", () => {
    it("applies the default balance", () => {
      const model = createColorModel();

      expect(model.rgbColor(0.5, 0.5, 0.5)).toEqual([115, 128, 77]);
      expect(model.rgbColor(1, 1, 1)).toEqual([230, 255, 153]);
      expect(model.rgbColor(0, 0, 0)).toEqual([0, 0, 0]);
    });

    it("produces gray with a neutral balance", () => {
      const model = createColorModel({ balance: [1, 1, 1] });

      expect(model.rgbColor(0.5, 0.5, 0.5)).toEqual([128, 128, 128]);
    });

    it("clamps out-of-range inputs", () => {
      const model = createColorModel({ balance: [1, 1, 1] });

      expect(model.rgbColor(2, -1, 0.5)).toEqual([255, 0, 128]);
    });
  });

  describe("image conversion", () => {
    it("maps image white to balanced device white", () => {
      const model = createColorModel();

      expect(model.imageToLedRgb([255, 255, 255])).toEqual([230, 255, 153]);
      expect(model.imageToLedRgb([0, 0, 0])).toEqual([0, 0, 0]);
    });

    it("maps balanced device white back to image white", () => {
      const model = createColorModel();

      expect(model.ledToImageRgb([230, 255, 153])).toEqual([255, 255, 255]);
    });
  });

  describe("hslColor", () => {
    it("is hue independent when saturation is zero", () => {
      const model = createColorModel();

      for (const h of [0, 0.1, 0.33, 0.5, 0.9]) {
        expect(model.hslColor(h, 0, 0)).toEqual([115, 128, 77]);
      }
    });

    it("is black at lightness -1 for every hue, saturation and policy", () => {
      const models = [
        createColorModel(),
        createColorModel({ lightnessPolicy: "linear" }),
        createColorModel({ colorStyle: "3col" }),
      ];

      for (const model of models) {
        for (const h of [0, 0.2, 0.45, 0.7, 0.99]) {
          for (const s of [0, 0.5, 1]) {
            expect(model.hslColor(h, s, -1)).toEqual([0, 0, 0]);
          }
        }
      }
    });

    it("starts the ramp at blue", () => {
      const model = createColorModel({ balance: [1, 1, 1], lightnessPolicy: "linear" });

      expect(model.hslColor(0, 1, 0)).toEqual([0, 0, 255]);
    });

    it("hits pure green at its anchor", () => {
      const model = createColorModel({ balance: [1, 1, 1], lightnessPolicy: "linear" });

      expect(model.hslColor(0.25, 1, 0)).toEqual([0, 255, 0]);
    });

    it("interpolates between anchors and normalizes the strongest channel", () => {
      const model = createColorModel({ balance: [1, 1, 1], lightnessPolicy: "linear" });

      expect(model.hslColor(0.5, 1, 0)).toEqual([255, 85, 0]);
    });

    it("scales the hue linearly below mid lightness", () => {
      const model = createColorModel({ balance: [1, 1, 1], lightnessPolicy: "linear" });

      expect(model.hslColor(0, 1, -0.5)).toEqual([0, 0, 128]);
    });

    it("tracks perceptual brightness with the equilight policy", () => {
      const model = createColorModel({ balance: [1, 1, 1] });

      for (const h of [0, 0.25, 0.5, 0.75]) {
        for (const l of [-0.5, 0, 0.5]) {
          const [r, g, b] = model.hslColor(h, 1, l);
          const perceived = model.colorBrightness(r / 255, g / 255, b / 255);
          expect(perceived).toBeCloseTo((l + 1) / 2, 2);
        }
      }
    });
  });
});

describe("parseColorStyle", () => {
  it("accepts the known ramp styles", () => {
    expect(parseColorStyle("10col")).toBe("10col");
  });

  it("rejects anything else", () => {
    expect(() => parseColorStyle("12col")).toThrow(ValidationError);
  });
});

describe("parseLightnessPolicy", () => {
  it("accepts linear and equilight", () => {
    expect(parseLightnessPolicy("linear")).toBe("linear");
    expect(parseLightnessPolicy("equilight")).toBe("equilight");
  });

  it("rejects anything else", () => {
    expect(() => parseLightnessPolicy("flat")).toThrow(ValidationError);
  });
});
