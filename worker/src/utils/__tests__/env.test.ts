import { getEnvBoolean, getEnvNumber, getEnvString } from "../env";

describe("getEnvBoolean", () => {
  const ORIGINAL_ENV = { ...process.env };

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  it("returns default when unset", () => {
    delete process.env.TEST_FLAG;
    expect(getEnvBoolean("TEST_FLAG", false)).toBe(false);
    expect(getEnvBoolean("TEST_FLAG", true)).toBe(true);
  });

  it("treats truthy strings as true", () => {
    ["1", "true", "yes", "on", " TRUE  "].forEach((v) => {
      process.env.TEST_FLAG = v;
      expect(getEnvBoolean("TEST_FLAG", false)).toBe(true);
    });
  });

  it("treats falsy strings as false", () => {
    ["0", "false", "no", "off", " False "].forEach((v) => {
      process.env.TEST_FLAG = v;
      expect(getEnvBoolean("TEST_FLAG", true)).toBe(false);
    });
  });

  it("falls back on unrecognised values", () => {
    process.env.TEST_FLAG = "maybe";
    expect(getEnvBoolean("TEST_FLAG", true)).toBe(true);
  });
});

describe("getEnvNumber", () => {
  const ORIGINAL_ENV = { ...process.env };

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  it("parses finite numbers", () => {
    process.env.TEST_NUM = "12.5";
    expect(getEnvNumber("TEST_NUM", 1)).toBe(12.5);
  });

  it("returns default for blank or non-numeric values", () => {
    process.env.TEST_NUM = "  ";
    expect(getEnvNumber("TEST_NUM", 7)).toBe(7);
    process.env.TEST_NUM = "ten";
    expect(getEnvNumber("TEST_NUM", 7)).toBe(7);
    delete process.env.TEST_NUM;
    expect(getEnvNumber("TEST_NUM", 7)).toBe(7);
  });
});

describe("getEnvString", () => {
  const ORIGINAL_ENV = { ...process.env };

  afterEach(() => {
    process.env = { ...ORIGINAL_ENV };
  });

  it("trims and falls back on empty", () => {
    process.env.TEST_STR = "  value ";
    expect(getEnvString("TEST_STR", "d")).toBe("value");
    process.env.TEST_STR = "";
    expect(getEnvString("TEST_STR", "d")).toBe("d");
  });
});
