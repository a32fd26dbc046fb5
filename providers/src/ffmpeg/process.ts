import { execFile } from 'node:child_process';
import { ExportErrorCode, createExportError, toError } from '@transcut/core';
import type { TranscutError } from '@transcut/core';

const MAX_STDIO_BUFFER_BYTES = 100 * 1024 * 1024;

export interface RunMediaToolOptions {
  signal?: AbortSignal;
  /** Called with every complete stderr line while the tool runs. */
  onStderrLine?: (line: string) => void;
}

function readField(error: unknown, key: 'code' | 'signal' | 'stderr'): unknown {
  return typeof error === 'object' && error !== null ? Reflect.get(error, key) : undefined;
}

function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === 'AbortError' || String(readField(error, 'code')) === 'ABORT_ERR';
}

/**
 * Runs ffmpeg or ffprobe and resolves with its stdout. Failures are mapped to
 * export errors: E013 cancelled, E012 missing input, E011 binary not found,
 * E010 anything else.
 */
export async function runMediaTool(binary: string, args: string[], options: RunMediaToolOptions = {}): Promise<string> {
  const { signal, onStderrLine } = options;
  let streamedStderr = '';
  let stderrLineBuffer = '';

  const consumeStderrChunk = (chunk: string): void => {
    streamedStderr += chunk;
    stderrLineBuffer += chunk;

    const lines = stderrLineBuffer.split(/\r?\n|\r/g);
    stderrLineBuffer = lines.pop() ?? '';

    if (!onStderrLine) {
      return;
    }
    for (const line of lines) {
      onStderrLine(line);
    }
  };

  try {
    return await new Promise<string>((resolve, reject) => {
      const child = execFile(
        binary,
        args,
        { encoding: 'utf8', maxBuffer: MAX_STDIO_BUFFER_BYTES, signal },
        (error, stdout) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(stdout);
        },
      );

      child.stderr?.on('data', (chunk) => {
        consumeStderrChunk(String(chunk));
      });
    });
  } catch (error) {
    const fieldStderr = readField(error, 'stderr');
    throw toMediaToolError(error, binary, streamedStderr || (typeof fieldStderr === 'string' ? fieldStderr : ''));
  }
}

export function toMediaToolError(error: unknown, binary: string, stderr: string): TranscutError {
  const message = toError(error).message;

  if (isAbortError(error)) {
    return createExportError(ExportErrorCode.RENDER_CANCELLED, `${binary} was cancelled.`, { cause: error });
  }

  if (stderr.includes('No such file or directory') || message.includes('No such file')) {
    return createExportError(
      ExportErrorCode.MISSING_INPUT,
      `${binary} input file not found: ${message}${stderr ? `\n${binary} stderr: ${stderr}` : ''}`,
      { cause: error },
    );
  }

  if (readField(error, 'code') === 'ENOENT' || message.includes('ENOENT')) {
    return createExportError(ExportErrorCode.RENDERER_NOT_FOUND, `Could not run '${binary}': executable not found.`, {
      suggestion: 'Install FFmpeg and make sure it is on your PATH, or set TRANSCUT_FFMPEG_PATH / TRANSCUT_FFPROBE_PATH.',
      cause: error,
    });
  }

  const code = readField(error, 'code');
  const terminationSignal = readField(error, 'signal');
  const exitInfo =
    typeof terminationSignal === 'string'
      ? `Process killed by signal: ${terminationSignal}`
      : typeof code === 'number'
        ? `Exit code: ${code}`
        : 'Unknown exit reason';

  const details = stderr ? `${binary} failed. ${exitInfo}\n${binary} stderr:\n${stderr}` : `${binary} failed. ${exitInfo}\n${message}`;
  return createExportError(ExportErrorCode.RENDER_FAILED, details, { cause: error });
}
