import "reflect-metadata";
import { describe, it, expect } from "vitest";
import { getDeclaredType, getErasedDeclaredType } from "../../src/descriptors/declared-type";
import { typeOf } from "../../src/descriptors/type-descriptor";
import { TypeArguments } from "../../src/decorators/type-arguments";
import { InvalidArgumentError } from "../../src/errors/locator-errors";
import { DESIGN_TYPE_METADATA } from "../../src/metadata/constants";

class List<T> {
  constructor(readonly items: T[] = []) {}
}

class Clock {
  now() {
    return 0;
  }
}

class Reports {
  @TypeArguments(String)
  titles!: List<string>;

  @TypeArguments(String, typeOf(List, Number))
  index!: Map<string, List<number>>;

  clock!: Clock;

  untyped: unknown;
}

// The test transpiler does not emit decorator metadata, so wire design:type
// the way the compiler would.
Reflect.defineMetadata(DESIGN_TYPE_METADATA, List, Reports.prototype, "titles");
Reflect.defineMetadata(DESIGN_TYPE_METADATA, Map, Reports.prototype, "index");
Reflect.defineMetadata(DESIGN_TYPE_METADATA, Clock, Reports.prototype, "clock");

describe("getDeclaredType", () => {
  it("should combine design:type with declared type arguments", () => {
    expect(getDeclaredType(Reports.prototype, "titles")).toBe(typeOf(List, String));
  });

  it("should keep nested type arguments", () => {
    expect(getDeclaredType(Reports.prototype, "index")).toBe(
      typeOf(Map, String, typeOf(List, Number)),
    );
  });

  it("should return the plain class when no arguments were declared", () => {
    expect(getDeclaredType(Reports.prototype, "clock")).toBe(typeOf(Clock));
  });

  it("should inherit declared arguments through the prototype chain", () => {
    // Arrange
    class MonthlyReports extends Reports {}

    // Act & Assert
    expect(getDeclaredType(MonthlyReports.prototype, "titles")).toBe(typeOf(List, String));
  });

  it("should let a subclass redeclare the arguments", () => {
    // Arrange
    class Archive {
      @TypeArguments(String)
      entries!: List<unknown>;
    }
    class NumberedArchive extends Archive {
      @TypeArguments(Number)
      entries!: List<unknown>;
    }
    Reflect.defineMetadata(DESIGN_TYPE_METADATA, List, Archive.prototype, "entries");

    // Act & Assert
    expect(getDeclaredType(Archive.prototype, "entries")).toBe(typeOf(List, String));
    expect(getDeclaredType(NumberedArchive.prototype, "entries")).toBe(typeOf(List, Number));
  });

  it("should fail when the member has no declared type metadata", () => {
    expect(() => getDeclaredType(Reports.prototype, "untyped")).toThrow(InvalidArgumentError);
    expect(() => getDeclaredType(Reports.prototype, "untyped")).toThrow(
      "No declared type metadata for Reports.untyped",
    );
  });

  it("should name an owner without a constructor as anonymous", () => {
    // Arrange
    const bare: object = Object.create(null);

    // Act & Assert
    expect(() => getDeclaredType(bare, "value")).toThrow(InvalidArgumentError);
    expect(() => getDeclaredType(bare, "value")).toThrow(
      "No declared type metadata for <anonymous>.value",
    );
  });
});

describe("getErasedDeclaredType", () => {
  it("should drop declared type arguments", () => {
    expect(getErasedDeclaredType(Reports.prototype, "titles")).toBe(typeOf(List));
    expect(getErasedDeclaredType(Reports.prototype, "index")).toBe(typeOf(Map));
  });

  it("should fail when the member has no declared type metadata", () => {
    expect(() => getErasedDeclaredType(Reports.prototype, "untyped")).toThrow(
      InvalidArgumentError,
    );
  });

  it("should fail cleanly for a null-prototype target", () => {
    expect(() => getErasedDeclaredType(Object.create(null), "value")).toThrow(
      "No declared type metadata for <anonymous>.value",
    );
  });
});
