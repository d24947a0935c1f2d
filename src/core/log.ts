export type Logger = (message: string) => void;

export const silentLogger: Logger = () => undefined;

function timestampUtc(): string {
  return new Date().toISOString();
}

export function createStdoutLogger(stream: Pick<NodeJS.WriteStream, 'write'> = process.stdout): Logger {
  return (message) => {
    stream.write(`[${timestampUtc()}] ${message}\n`);
  };
}
