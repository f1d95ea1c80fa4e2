import { jest } from "@jest/globals";
import { detectLanguage, detectLanguageHeuristic } from "../core/services/language/detect-language.js";

describe("language detection", () => {
  describe("keyword heuristic", () => {
    it("recognizes Spanish markers", () => {
      expect(detectLanguageHeuristic("estoy listo")).toBe("es");
      expect(detectLanguageHeuristic("Buenas tardes")).toBe("es");
      expect(detectLanguageHeuristic("Necesito información, por favor")).toBe("es");
    });

    it("recognizes Spanish punctuation and letters", () => {
      expect(detectLanguageHeuristic("¿Cuándo?")).toBe("es");
      expect(detectLanguageHeuristic("mañana")).toBe("es");
    });

    it("defaults to French", () => {
      expect(detectLanguageHeuristic("Bonjour, je suis prêt")).toBe("fr");
      expect(detectLanguageHeuristic("ok")).toBe("fr");
      expect(detectLanguageHeuristic("")).toBe("fr");
    });

    it("matches whole words only", () => {
      expect(detectLanguageHeuristic("Je travaille chez Holasoft")).toBe("fr");
    });
  });

  it("trusts a valid classifier reply", async () => {
    const classifier = jest.fn(async (_text: string) => " ES\n");
    await expect(detectLanguage("Bonjour", { classifier })).resolves.toBe("es");
    expect(classifier).toHaveBeenCalledWith("Bonjour");
  });

  it("falls back to the heuristic when the classifier fails", async () => {
    const classifier = async (_text: string): Promise<string> => {
      throw new Error("timeout");
    };
    await expect(detectLanguage("estoy listo", { classifier })).resolves.toBe("es");
  });

  it("falls back to the heuristic on an unexpected reply", async () => {
    await expect(detectLanguage("hola, quiero información", { classifier: async () => "spanish" })).resolves.toBe("es");
    await expect(detectLanguage("Bonjour", { classifier: async () => "it" })).resolves.toBe("fr");
  });

  it("uses the heuristic when no classifier is available", async () => {
    await expect(detectLanguage("gracias", { classifier: null })).resolves.toBe("es");
    await expect(detectLanguage("merci")).resolves.toBe("fr");
  });
});
