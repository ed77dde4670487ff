import pino from 'pino';

export type AgentLogger = pino.Logger;

export function createAgentLogger(logFile: string, level: string): AgentLogger {
  return pino(
    {
      level,
    },
    pino.destination({
      dest: logFile,
      mkdir: true,
      sync: false,
    }),
  );
}

export function createSilentLogger(): AgentLogger {
  return pino({ level: 'silent' });
}
