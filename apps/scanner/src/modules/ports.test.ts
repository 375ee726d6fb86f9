import { describe, expect, it } from "vitest";
import { createModuleContext, testHost } from "../test-utils/module-context";
import { makeResponse } from "../test-utils/stub-transport";
import { createPortsModule, type PortProbe } from "./ports";

const probeWithOpen = (open: number[]) => {
  const probed: Array<{ host: string; port: number; timeoutMs: number }> = [];
  const probe: PortProbe = async (host, port, timeoutMs) => {
    probed.push({ host, port, timeoutMs });
    return open.includes(port) ? "open" : "closed";
  };
  return { probe, probed };
};

const response = makeResponse("https://www.example.com/");

describe("ports module", () => {
  it("lists open common ports in ascending order", async () => {
    const { probe, probed } = probeWithOpen([443, 22]);
    const module = createPortsModule({ probe });

    const fields = await module.analyze(response, createModuleContext());

    expect(fields).toEqual({
      open_ports: [
        { port: 22, service: "SSH" },
        { port: 443, service: "HTTPS" },
      ],
    });
    expect(probed).toHaveLength(14);
    expect(probed.every((entry) => entry.host === "www.example.com" && entry.timeoutMs === 1000)).toBe(true);
  });

  it("labels ports outside the common list as Unknown", async () => {
    const { probe } = probeWithOpen([9999, 8443]);
    const module = createPortsModule({ ports: [9999, 22, 8443], probe });

    const fields = await module.analyze(response, createModuleContext());

    expect(fields.open_ports).toEqual([
      { port: 8443, service: "HTTPS-Alt" },
      { port: 9999, service: "Unknown" },
    ]);
  });

  it("strips brackets from IPv6 literals", async () => {
    const { probe, probed } = probeWithOpen([]);
    const module = createPortsModule({ ports: [80], probe });
    const host = { ...testHost("[2001:db8::1]"), url: "https://[2001:db8::1]/" };

    await module.analyze(makeResponse(host.url), createModuleContext({ host }));

    expect(probed.map((entry) => entry.host)).toEqual(["2001:db8::1"]);
  });

  it("skips probing once the scan is cancelled", async () => {
    const { probe, probed } = probeWithOpen([80]);
    const controller = new AbortController();
    controller.abort();
    const module = createPortsModule({ probe });

    const fields = await module.analyze(response, createModuleContext({ signal: controller.signal }));

    expect(fields.open_ports).toEqual([]);
    expect(probed).toEqual([]);
  });
});
