import { afterEach, describe, it, expect, vi } from 'vitest';
import { createStaticEnvSource } from '../src/config/env';
import { buildLLMConfig } from '../src/config/llm';
import { buildProjectConfig } from '../src/config/project';
import { ConsoleConfigObserver } from '../src/observability/consoleObserver';
import { notifyConfigBuilt } from '../src/observability/notify';
import { RecordingObserver } from './helpers';

class BufferSink {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

describe('ConsoleConfigObserver', () => {
  it('dumps the LLM view with the key redacted', () => {
    const sink = new BufferSink();
    const llm = buildLLMConfig(createStaticEnvSource({ MOONSHOT_API_KEY: 'test-secret' }));

    new ConsoleConfigObserver(sink).onConfigBuilt({ kind: 'llm', config: llm });

    expect(sink.chunks).toEqual([
      [
        '=== LLM configuration (debug) ===',
        'provider: moonshot',
        'apiKey: [redacted] (from MOONSHOT_API_KEY)',
        'modelName: kimi-k2-0905-preview',
        'baseURL: https://api.moonshot.cn/v1',
        'temperature: 0.7',
        'maxTokens: 1000',
        'timeoutSeconds: 30',
        '',
      ].join('\n'),
    ]);
  });

  it('dumps the project view', () => {
    const sink = new BufferSink();
    const project = buildProjectConfig(
      createStaticEnvSource({ DEBUG_MODE: 'true', LOG_LEVEL: 'warning' }),
    );

    new ConsoleConfigObserver(sink).onConfigBuilt({ kind: 'project', config: project });

    const lines = sink.chunks.join('').split('\n');
    expect(lines[0]).toBe('=== Project configuration (debug) ===');
    expect(lines).toContain('debugMode: true');
    expect(lines).toContain('logLevel: WARNING');
    expect(lines).toContain('agentWorkRoot: ./agent_work');
  });
});

describe('notifyConfigBuilt', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports non-Error throws and keeps notifying', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const after = new RecordingObserver();
    const project = buildProjectConfig(createStaticEnvSource({}));

    notifyConfigBuilt(
      [
        {
          onConfigBuilt() {
            throw 'nope';
          },
        },
        after,
      ],
      { kind: 'project', config: project },
    );

    expect(after.views).toEqual([{ kind: 'project', config: project }]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      'Config diagnostic sink is unavailable (caused by: Unknown error: nope)',
    );
  });
});
