// ============================================================================
// flexwatch: Decoder output source (stdin pipe or spawned multimon-ng pipeline)
// ============================================================================
import { spawn, type ChildProcess } from 'child_process';
import type { Readable } from 'stream';
import type { AppConfig } from '../config.js';
import { LoadError, errorMessage } from '../errors.js';
import { logDebug, logInfo, logWarn } from '../logger.js';

export interface DecoderStream {
  stream: Readable;
  description: string;
  stop(): void;
}

export interface StdinLike extends Readable {
  isTTY?: boolean;
}

function fromStdin(stdin: StdinLike): DecoderStream {
  if (stdin.isTTY) {
    throw new LoadError('stdin', 'stdin is a terminal; pipe multimon-ng output in or set DECODER_SOURCE=command');
  }
  return { stream: stdin, description: 'stdin', stop: () => stdin.pause() };
}

/**
 * Spawn the decoder pipeline through the shell. The child is not restarted
 * when it exits: its stdout ending is reported as lost ingestion.
 */
function fromCommand(command: string): Promise<DecoderStream> {
  return new Promise((resolve, reject) => {
    let child: ChildProcess;
    try {
      child = spawn(command, { shell: true, stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (err) {
      reject(new LoadError(command, `Cannot start decoder: ${errorMessage(err)}`, { cause: err }));
      return;
    }

    const { stdout, stderr } = child;
    if (!stdout) {
      reject(new LoadError(command, 'Decoder has no stdout'));
      return;
    }

    let lastError: string | null = null;
    stderr?.setEncoding('utf8');
    stderr?.on('data', (data: string) => {
      const line = data.trim();
      if (!line) return;
      lastError = line;
      logDebug(`📡 decoder: ${line}`);
    });

    child.once('error', (err) => {
      reject(new LoadError(command, `Cannot start decoder: ${err.message}`, { cause: err }));
    });

    child.once('spawn', () => {
      logInfo(`📡 Decoder started (PID ${child.pid ?? '?'}): ${command}`);
      child.once('exit', (code, signal) => {
        logWarn(`📡 Decoder exited (code=${code}, signal=${signal})${lastError ? `: ${lastError}` : ''}`);
      });
      resolve({
        stream: stdout,
        description: `command: ${command}`,
        stop: () => {
          if (child.exitCode !== null || child.signalCode !== null) return;
          child.kill('SIGTERM');
          // Force kill after 3s
          const timer = setTimeout(() => {
            if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
          }, 3000);
          timer.unref();
        },
      });
    });
  });
}

export async function openDecoderStream(
  config: AppConfig['decoder'],
  stdin: StdinLike = process.stdin,
): Promise<DecoderStream> {
  if (config.source === 'stdin') return fromStdin(stdin);
  return fromCommand(config.command);
}
