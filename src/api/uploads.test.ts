import { decodeBase64, readUpload } from "./uploads";
import { ValidationError } from "../domain/errors";

describe("uploads", () => {
  describe("decodeBase64", () => {
    it("decodes plain base64", () => {
      expect(decodeBase64("aGVsbG8=").toString("utf-8")).toBe("hello");
    });

    it("decodes a data URL", () => {
      expect(decodeBase64("data:text/plain;base64,aGVsbG8=").toString("utf-8")).toBe("hello");
    });

    it("ignores whitespace and line breaks", () => {
      expect(decodeBase64("aGVs\nbG8=").toString("utf-8")).toBe("hello");
    });

    it.each(["not base64!", "aGVsbG8"])("rejects %p", (content) => {
      expect(() => decodeBase64(content)).toThrow(
        new ValidationError("File content is not valid base64")
      );
    });
  });

  describe("readUpload", () => {
    it("returns null when there is no file", () => {
      expect(readUpload(undefined)).toBeNull();
      expect(readUpload(null)).toBeNull();
    });

    it("reads name and bytes", () => {
      const file = readUpload({ name: " notes.txt ", contentBase64: "aGVsbG8=" });

      expect(file?.originalName).toBe("notes.txt");
      expect(file?.bytes.toString("utf-8")).toBe("hello");
    });

    it.each([["a string"], [{ name: "a.txt" }], [{ name: 7, contentBase64: "" }]])(
      "rejects %p",
      (value) => {
        expect(() => readUpload(value)).toThrow(
          new ValidationError("file must have a name and contentBase64")
        );
      }
    );

    it("requires a file name", () => {
      expect(() => readUpload({ name: "  ", contentBase64: "aGVsbG8=" })).toThrow(
        new ValidationError("file name is required")
      );
    });
  });
});
