import net from 'net';

export const isPortOpen = (host: string, port: number, timeoutMs = 1000): Promise<boolean> => {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });
    let settled = false;

    const finalize = (open: boolean) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(open);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finalize(true));
    socket.once('timeout', () => finalize(false));
    socket.once('error', () => finalize(false));
  });
};

export const waitForPort = async (
  host: string,
  port: number,
  timeoutMs: number,
  intervalMs = 250,
): Promise<boolean> => {
  const deadline = Date.now() + timeoutMs;

  while (true) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    if (await isPortOpen(host, port, Math.min(remaining, 1000))) return true;
    const pause = Math.min(intervalMs, deadline - Date.now());
    if (pause <= 0) return false;
    await new Promise((resolve) => setTimeout(resolve, pause));
  }
};
