export const getLocalTs = (d = new Date()) => {
  return d.getFullYear() + "-" +
    String(d.getMonth() + 1).padStart(2, "0") + "-" +
    String(d.getDate()).padStart(2, "0") + " " +
    String(d.getHours()).padStart(2, "0") + ":" +
    String(d.getMinutes()).padStart(2, "0") + ":" +
    String(d.getSeconds()).padStart(2, "0");
};

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function createLogger(tag: string): Logger {
  const prefix = () => `${getLocalTs()} [${tag}]`;
  return {
    info: (message) => console.log(`${prefix()} ${message}`),
    warn: (message) => console.warn(`${prefix()} ⚠️  ${message}`),
    error: (message, err) => {
      if (err === undefined) console.error(`${prefix()} ❌ ${message}`);
      else console.error(`${prefix()} ❌ ${message}`, err);
    },
  };
}
