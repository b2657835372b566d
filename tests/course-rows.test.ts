import { beforeAll, describe, expect, it } from "vitest";

import {
  extractCourseFields,
  extractRowByPattern,
  extractRowByTokens,
  hasCourseData,
  splitCourseRows,
  truncateAtFooter,
  type RowFieldExtractor
} from "@/lib/parser/course-rows";
import { loadTranscriptTemplate, type CompiledTemplate } from "@/lib/template/transcript-template";

describe("course rows", () => {
  let template: CompiledTemplate;

  beforeAll(async () => {
    template = await loadTranscriptTemplate();
  });

  describe("splitCourseRows", () => {
    it("splits a block at every course code and normalizes the code", () => {
      const rows = splitCourseRows(
        "MAT 101 Calculus I Tr 3 0 3.0 5.0 AA 4.00\n*FIZ  102EL Physics Lab Tr 0 2 1 1.5 BB 3.00"
      );

      expect(rows).toEqual([
        { code: "MAT 101", text: "Calculus I Tr 3 0 3.0 5.0 AA 4.00" },
        { code: "FIZ 102EL", text: "Physics Lab Tr 0 2 1 1.5 BB 3.00" }
      ]);
    });

    it("returns nothing for text without a course code", () => {
      expect(splitCourseRows("Toplam kredi 30\nGenel ortalama 3.10")).toEqual([]);
    });
  });

  describe("truncateAtFooter", () => {
    it("cuts at the earliest marker in the text", () => {
      const row = "Calculus Tr 3 0 3 5 AA 4.00 İSTANBUL TEKNİK ÜNİVERSİTESİ Öğrenci No: 000";

      expect(truncateAtFooter(row, template.footerMarkers)).toBe("Calculus Tr 3 0 3 5 AA 4.00");
    });

    it("leaves rows without markers untouched", () => {
      expect(truncateAtFooter("Calculus Tr 3 0 3 5 AA 4.00", template.footerMarkers)).toBe("Calculus Tr 3 0 3 5 AA 4.00");
    });
  });

  describe("hasCourseData", () => {
    it("requires a language label followed by three numbers", () => {
      expect(hasCourseData("Hukuka Giriş Tr 2 0 2 --", template)).toBe(true);
      expect(hasCourseData("Seminer Tr 2", template)).toBe(false);
    });
  });

  describe("extractRowByPattern", () => {
    it("reads every field and cleans the name", () => {
      expect(extractRowByPattern("Calculus I (Matematik) Tr 3 0 3.0 5.0 AA 4.00", template)).toEqual({
        name: "Calculus I",
        language: "Tr",
        theoryHours: "3",
        labHours: "0",
        localCredits: "3.0",
        ectsCredits: "5.0",
        grade: "AA",
        points: "4.00",
        comment: ""
      });
    });

    it("keeps the plus variant of a grade and the trailing comment code", () => {
      const fields = extractRowByPattern("Türk Dili II Tr 2 0 2 2 CB+ 2.75 TK", template);

      expect(fields?.grade).toBe("CB+");
      expect(fields?.points).toBe("2.75");
      expect(fields?.comment).toBe("TK");
    });

    it("joins a name wrapped over several lines", () => {
      const fields = extractRowByPattern("Intro to\nScientific   Computing (Bilimsel\nHesaplama) İng. 3 2 4 6 CC 2.00", template);

      expect(fields?.name).toBe("Intro to Scientific Computing");
      expect(fields?.language).toBe("İng.");
    });

    it("does not match when grade and points are swapped", () => {
      expect(extractRowByPattern("Algorithms Tr 3 0 3.0 5.0 4.00 AA", template)).toBeNull();
    });
  });

  describe("extractRowByTokens", () => {
    it("restores the grade/points order from grade-set membership", () => {
      expect(extractRowByTokens("Algorithms Tr 3 0 3.0 5.0 4.00 AA", template)).toEqual({
        name: "Algorithms",
        language: "Tr",
        theoryHours: "3",
        labHours: "0",
        localCredits: "3.0",
        ectsCredits: "5.0",
        grade: "AA",
        points: "4.00",
        comment: ""
      });
    });

    it("reads the fields after the last language label", () => {
      const fields = extractRowByTokens("Trade Law Tr 3 0 3 5 4.00 BB RP", template);

      expect(fields?.name).toBe("Trade Law");
      expect(fields?.grade).toBe("BB");
      expect(fields?.points).toBe("4.00");
      expect(fields?.comment).toBe("RP");
    });

    it("yields nothing with fewer than six tokens", () => {
      expect(extractRowByTokens("Hukuka Giriş Tr 2 0 2 --", template)).toBeNull();
    });

    it("yields nothing when no token is a grade symbol", () => {
      expect(extractRowByTokens("Project Tr 3 0 3 5 4.00 XX", template)).toBeNull();
    });

    it("yields nothing when a figure is not numeric", () => {
      expect(extractRowByTokens("Seminar Tr 3 0 x 5 AA 4.00", template)).toBeNull();
    });
  });

  describe("extractCourseFields", () => {
    it("falls back to the token reader when the pattern fails", () => {
      expect(extractCourseFields("Algorithms Tr 3 0 3.0 5.0 4.00 AA", template)?.grade).toBe("AA");
    });

    it("returns the first extractor result that succeeds", () => {
      const empty: RowFieldExtractor = () => null;
      const fixed: RowFieldExtractor = () => ({
        name: "Fixed",
        language: "Tr",
        theoryHours: "1",
        labHours: "1",
        localCredits: "1",
        ectsCredits: "1",
        grade: "AA",
        points: "4.00",
        comment: ""
      });
      const unreachable: RowFieldExtractor = () => {
        throw new Error("should not run");
      };

      expect(extractCourseFields("anything", template, [empty, fixed, unreachable])?.name).toBe("Fixed");
      expect(extractCourseFields("anything", template, [empty])).toBeNull();
    });
  });
});
