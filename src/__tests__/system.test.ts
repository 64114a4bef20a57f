import { describe, expect, test } from "vitest";
import { systemInfo } from "../system.js";
import { fakeSession, ok } from "./helpers.js";

describe("systemInfo", () => {
  test("flattens show system info", async () => {
    const session = fakeSession([
      ok(
        "<result><system><hostname>pano-1</hostname><model>Panorama</model>" +
        "<serial>000702100001</serial><sw-version>11.1.2</sw-version></system></result>",
      ),
    ]);

    expect(await systemInfo(session)).toEqual({
      hostname: "pano-1",
      model: "Panorama",
      serial: "000702100001",
      "sw-version": "11.1.2",
    });
    expect(session.sent[0].cmd).toBe("<show><system><info/></system></show>");
  });
});
