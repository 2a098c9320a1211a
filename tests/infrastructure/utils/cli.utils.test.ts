import { InvalidArgumentError } from "commander";
import { parsePositiveInt } from "../../../src/infrastructure/utils/cli.utils.js";

describe("parsePositiveInt", () => {
  test("accepts positive integers", () => {
    expect(parsePositiveInt("1")).toBe(1);
    expect(parsePositiveInt("8")).toBe(8);
  });

  test.each(["0", "-2", "1.5", "four", "3x", ""])(
    "rejects %p as a usage error",
    (value) => {
      expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
    },
  );
});
