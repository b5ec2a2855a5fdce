import "reflect-metadata";
import { describe, it, expect } from "vitest";
import { Abstract } from "../../src/decorators/injectable";
import {
  createInterfaceToken,
  isClass,
  isConcreteClass,
  isInterfaceToken,
  tokenToString,
} from "../../src/di/tokens";

describe("createInterfaceToken", () => {
  it("should create distinct tokens for the same description", () => {
    // Act
    const first = createInterfaceToken("Cache");
    const second = createInterfaceToken("Cache");

    // Assert
    expect(first).not.toBe(second);
    expect(first).toEqual({ kind: "interface", description: "Cache" });
  });

  it("should freeze the token", () => {
    expect(Object.isFrozen(createInterfaceToken("Queue"))).toBe(true);
  });
});

describe("isInterfaceToken", () => {
  it("should accept tokens and reject everything else", () => {
    class Service {}

    expect(isInterfaceToken(createInterfaceToken("Bus"))).toBe(true);
    expect(isInterfaceToken(Service)).toBe(false);
    expect(isInterfaceToken(null)).toBe(false);
    expect(isInterfaceToken({ kind: "interface" })).toBe(false);
    expect(isInterfaceToken({ kind: "class", description: "Bus" })).toBe(false);
  });
});

describe("isConcreteClass", () => {
  it("should read the @Abstract() marker from the class itself only", () => {
    // Arrange
    @Abstract()
    abstract class Transport {}
    class HttpTransport extends Transport {}

    // Assert
    expect(isClass(Transport)).toBe(true);
    expect(isConcreteClass(Transport)).toBe(false);
    expect(isConcreteClass(HttpTransport)).toBe(true);
  });
});

describe("tokenToString", () => {
  it("should name classes and interface tokens", () => {
    class Mailer {}

    expect(tokenToString(Mailer)).toBe("Mailer");
    expect(tokenToString(createInterfaceToken("Clock"))).toBe("Clock");
  });
});
