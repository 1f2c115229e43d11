import { describe, it, expect } from "vitest";
import {
  InvalidGeometryError,
  InvalidBuildingConfigError,
  StoreyNotFoundError,
  TreeIntegrityError,
} from "./errors.js";

describe("Error classes", () => {
  const errorCases: Array<[string, new (msg: string) => Error]> = [
    ["InvalidGeometryError", InvalidGeometryError],
    ["InvalidBuildingConfigError", InvalidBuildingConfigError],
    ["StoreyNotFoundError", StoreyNotFoundError],
    ["TreeIntegrityError", TreeIntegrityError],
  ];

  for (const [name, ErrorClass] of errorCases) {
    describe(name, () => {
      it("is instanceof Error", () => {
        const err = new ErrorClass("test message");
        expect(err).toBeInstanceOf(Error);
      });

      it("is instanceof its own class", () => {
        const err = new ErrorClass("test message");
        expect(err).toBeInstanceOf(ErrorClass);
      });

      it("has correct .name property", () => {
        const err = new ErrorClass("test message");
        expect(err.name).toBe(name);
      });

      it("carries the provided message", () => {
        const msg = `error in ${name}`;
        const err = new ErrorClass(msg);
        expect(err.message).toBe(msg);
      });

      it("has a stack trace", () => {
        const err = new ErrorClass("stack check");
        expect(err.stack).toBeDefined();
      });
    });
  }

  describe("instanceof checks across catch boundaries", () => {
    it("StoreyNotFoundError can be caught as Error and checked", () => {
      let caught: unknown = null;
      try {
        throw new StoreyNotFoundError("no storey 4");
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(Error);
      expect(caught).toBeInstanceOf(StoreyNotFoundError);
      expect(caught instanceof Error ? caught.name : "").toBe(
        "StoreyNotFoundError",
      );
    });

    it("InvalidGeometryError is not mistaken for another error class", () => {
      const err = new InvalidGeometryError("three corners");
      expect(err).not.toBeInstanceOf(TreeIntegrityError);
      expect(err).not.toBeInstanceOf(InvalidBuildingConfigError);
    });
  });
});
