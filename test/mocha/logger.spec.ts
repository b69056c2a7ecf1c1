import { assert } from "chai";
import {
  bumpLogging,
  logger,
  resetLoggerSettings,
  setLogger,
  wouldLog,
} from "../../src/logger";

export function loggerTests() {
  let lines: string[] = [];
  const saved = process.env["SP_LOGGER"];

  const useSettings = (settings: string) => {
    process.env["SP_LOGGER"] = settings;
    resetLoggerSettings();
  };

  beforeEach(() => {
    lines = [];
    setLogger((message) => lines.push(message));
  });

  afterEach(() => {
    if (saved === undefined) {
      delete process.env["SP_LOGGER"];
    } else {
      process.env["SP_LOGGER"] = saved;
    }
    resetLoggerSettings();
    setLogger((message) => console.log(message));
  });

  it("reads module levels with a default", () => {
    useSettings("flow-analysis:5;*=2;state-propagator;");
    assert.isTrue(wouldLog("flow-analysis", 5));
    assert.isFalse(wouldLog("flow-analysis", 6));
    assert.isTrue(wouldLog("state-propagator", 1));
    assert.isFalse(wouldLog("state-propagator", 2));
    assert.isTrue(wouldLog("bindings", 2));
    assert.isFalse(wouldLog("bindings", 3));
  });

  it("logs nothing without settings", () => {
    delete process.env["SP_LOGGER"];
    resetLoggerSettings();
    let built = 0;
    logger("state-propagator", 1, () => `built ${++built}`);
    assert.deepEqual(lines, []);
    assert.strictEqual(built, 0);
  });

  it("builds lazy messages only when they are logged", () => {
    useSettings("state-propagator:1");
    logger("state-propagator", 1, () => "verdict");
    logger("state-propagator", 5, () => "details");
    logger("state-propagator", 1, "plain");
    assert.deepEqual(lines, ["verdict", "plain"]);
  });

  it("bumps one module or all of them", () => {
    useSettings("flow-analysis:5;state-propagator:5");
    bumpLogging("flow-analysis", 2);
    assert.isFalse(wouldLog("flow-analysis", 4));
    assert.isTrue(wouldLog("flow-analysis", 3));
    assert.isTrue(wouldLog("state-propagator", 5));
    bumpLogging(null, -1);
    assert.isTrue(wouldLog("state-propagator", 6));
    assert.isTrue(wouldLog("flow-analysis", 4));
  });
}
