import { describe, it, expect } from "vitest";
import { AppError, ErrorCodes, InputDataError, UnknownMarketError, errorMessage, toError } from "./errors.ts";

describe("errors", () => {
  it("should map UnknownMarketError to market_not_found", () => {
    const err = new UnknownMarketError("m-404");
    expect(err).toBeInstanceOf(AppError);
    expect(err.statusCode).toBe(404);
    expect(err.marketId).toBe("m-404");
    expect(err.toJSON()).toEqual({
      error: "market_not_found",
      code: "market_not_found",
      details: "Market does not exist: m-404",
    });
  });

  it("should map InputDataError to invalid_trade_row", () => {
    const err = new InputDataError("bad row");
    expect(err.statusCode).toBe(422);
    expect(err.name).toBe("InputDataError");
  });

  it("should define a code for each error class only", () => {
    expect(Object.keys(ErrorCodes)).toEqual(["MARKET_NOT_FOUND", "INVALID_TRADE_ROW"]);
  });

  it("should normalize thrown values", () => {
    expect(errorMessage("plain")).toBe("plain");
    expect(toError(42).message).toBe("42");
    const original = new Error("boom");
    expect(toError(original)).toBe(original);
  });
});
