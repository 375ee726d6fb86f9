import net from "node:net";
import type { AnalysisModule } from "../scan/types";

export type PortState = "open" | "closed" | "filtered";

export const COMMON_PORTS: Record<number, string> = {
  21: "FTP",
  22: "SSH",
  25: "SMTP",
  80: "HTTP",
  443: "HTTPS",
  3306: "MySQL",
  3389: "RDP",
  5432: "PostgreSQL",
  6379: "Redis",
  8080: "HTTP-Proxy",
  8443: "HTTPS-Alt",
  8888: "HTTP-Alt",
  9200: "Elasticsearch",
  27017: "MongoDB",
};

const PORT_CONCURRENCY = 5;
const MAX_PORT_TIMEOUT_MS = 2000;

export type PortProbe = (host: string, port: number, timeoutMs: number, signal: AbortSignal) => Promise<PortState>;

/** Plain TCP connect; refused means closed, silence or other errors mean filtered. */
export const probePort: PortProbe = (host, port, timeoutMs, signal) =>
  new Promise((resolve) => {
    const socket = new net.Socket();
    let settled = false;

    const finish = (state: PortState) => {
      if (settled) return;
      settled = true;
      signal.removeEventListener("abort", onAbort);
      socket.destroy();
      resolve(state);
    };
    const onAbort = () => finish("filtered");

    signal.addEventListener("abort", onAbort, { once: true });
    socket.setTimeout(timeoutMs);
    socket.on("connect", () => finish("open"));
    socket.on("timeout", () => finish("filtered"));
    socket.on("error", (error: NodeJS.ErrnoException) => finish(error.code === "ECONNREFUSED" ? "closed" : "filtered"));
    socket.connect(port, host);
  });

export interface PortsModuleOptions {
  ports?: number[];
  probe?: PortProbe;
}

export const createPortsModule = ({
  ports = Object.keys(COMMON_PORTS).map(Number),
  probe = probePort,
}: PortsModuleOptions = {}): AnalysisModule => ({
  name: "ports",
  label: "Common Ports",
  description: "TCP connect check against a short list of common service ports.",
  priority: 210,
  fields: ["open_ports"],
  analyze: async (_response, { host, config, signal }) => {
    const timeoutMs = Math.min(config.timeoutMs, MAX_PORT_TIMEOUT_MS);
    const queue = [...ports];
    const open: number[] = [];

    const workers = Array.from({ length: Math.min(PORT_CONCURRENCY, queue.length || 1) }, async () => {
      while (queue.length && !signal.aborted) {
        const port = queue.shift();
        if (port === undefined) break;
        const state = await probe(host.hostname.replace(/^\[|\]$/g, ""), port, timeoutMs, signal);
        if (state === "open") open.push(port);
      }
    });

    await Promise.all(workers);

    return {
      open_ports: open
        .sort((a, b) => a - b)
        .map((port) => ({ port, service: COMMON_PORTS[port] ?? "Unknown" })),
    };
  },
});

export const portsModule = createPortsModule();
