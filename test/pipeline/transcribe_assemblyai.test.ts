import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { MockAgent } from 'undici';
import {
  AssemblyAIClient,
  nextPollStep,
  type AssemblyAIConfig,
  type Sleep,
} from '../../src/pipeline/transcribe_assemblyai.js';
import { makeTempDir } from '../helpers.js';

const BASE_URL = 'https://aai.test';
const API_KEY = 'test-secret';

describe('nextPollStep', () => {
  it('finishes on completed and defaults missing text to an empty string', () => {
    expect(nextPollStep({ jobId: 'j', status: 'completed', resultText: 'hi' })).toEqual({ type: 'done', text: 'hi' });
    expect(nextPollStep({ jobId: 'j', status: 'completed' })).toEqual({ type: 'done', text: '' });
  });

  it('fails on error with the provider detail', () => {
    expect(nextPollStep({ jobId: 'j', status: 'error', error: 'Audio file is too short' })).toEqual({
      type: 'failed',
      error: { kind: 'TranscriptionFailed', message: 'Transcription failed: Audio file is too short' },
    });
    expect(nextPollStep({ jobId: 'j', status: 'error' })).toEqual({
      type: 'failed',
      error: { kind: 'TranscriptionFailed', message: 'Transcription failed: Unknown error' },
    });
  });

  it('keeps waiting on queued, processing and unknown states', () => {
    for (const status of ['queued', 'processing', 'something-new']) {
      expect(nextPollStep({ jobId: 'j', status })).toEqual({ type: 'wait' });
    }
  });
});

describe('AssemblyAIClient', () => {
  let agent: MockAgent;
  let sleep: Mock<Sleep>;
  let dir: string;

  function createClient(overrides: Partial<AssemblyAIConfig> = {}) {
    return new AssemblyAIClient({
      apiKey: API_KEY,
      baseUrl: BASE_URL,
      sleep,
      dispatcher: agent,
      ...overrides,
    });
  }

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    sleep = vi.fn<Sleep>(async () => {});
    dir = makeTempDir();
  });

  afterEach(async () => {
    await agent.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('upload', () => {
    it('posts the file with the API key and returns the upload URL', async () => {
      const file = path.join(dir, 'clip.mp3');
      fs.writeFileSync(file, 'audio-bytes');
      agent
        .get(BASE_URL)
        .intercept({ path: '/v2/upload', method: 'POST', headers: { authorization: API_KEY } })
        .reply(200, { upload_url: 'https://cdn.aai.test/upload/1' });

      await expect(createClient().upload(file)).resolves.toEqual({
        ok: true,
        value: 'https://cdn.aai.test/upload/1',
      });
      agent.assertNoPendingInterceptors();
    });

    it('fails with UploadFailed carrying the provider body on a non-success status', async () => {
      const file = path.join(dir, 'clip.mp3');
      fs.writeFileSync(file, 'audio-bytes');
      agent
        .get(BASE_URL)
        .intercept({ path: '/v2/upload', method: 'POST' })
        .reply(401, '{"error":"Invalid API key"}');

      await expect(createClient().upload(file)).resolves.toEqual({
        ok: false,
        error: { kind: 'UploadFailed', message: 'Failed to upload audio: {"error":"Invalid API key"}' },
      });
    });

    it('fails with ConfigMissing before any request when no API key is set', async () => {
      const file = path.join(dir, 'clip.mp3');
      fs.writeFileSync(file, 'audio-bytes');

      await expect(createClient({ apiKey: undefined }).upload(file)).resolves.toEqual({
        ok: false,
        error: { kind: 'ConfigMissing', message: 'ASSEMBLYAI_API_KEY not set' },
      });
    });

    it('returns Cancelled without sending anything once the signal is aborted', async () => {
      const file = path.join(dir, 'clip.mp3');
      fs.writeFileSync(file, 'audio-bytes');
      agent.get(BASE_URL).intercept({ path: '/v2/upload', method: 'POST' }).reply(200, { upload_url: 'u' });
      const controller = new AbortController();
      controller.abort();

      await expect(createClient().upload(file, controller.signal)).resolves.toEqual({
        ok: false,
        error: { kind: 'Cancelled', message: 'Transcription cancelled' },
      });
      expect(agent.pendingInterceptors()).toHaveLength(1);
    });
  });

  describe('submit', () => {
    it('creates a job for the uploaded audio and returns its id', async () => {
      agent
        .get(BASE_URL)
        .intercept({
          path: '/v2/transcript',
          method: 'POST',
          body: JSON.stringify({ audio_url: 'https://cdn.aai.test/upload/1' }),
        })
        .reply(200, { id: 'job-1', status: 'queued' });

      await expect(createClient().submit('https://cdn.aai.test/upload/1')).resolves.toEqual({
        ok: true,
        value: 'job-1',
      });
    });

    it('fails with SubmitFailed on a non-success status', async () => {
      agent.get(BASE_URL).intercept({ path: '/v2/transcript', method: 'POST' }).reply(400, 'bad audio_url');

      await expect(createClient().submit('nope')).resolves.toEqual({
        ok: false,
        error: { kind: 'SubmitFailed', message: 'Failed to submit transcription: bad audio_url' },
      });
    });
  });

  describe('pollUntilDone', () => {
    function replyStatus(body: object) {
      agent.get(BASE_URL).intercept({ path: '/v2/transcript/job-1', method: 'GET' }).reply(200, body);
    }

    it('returns the text after queued, processing, completed in exactly three polls', async () => {
      replyStatus({ id: 'job-1', status: 'queued' });
      replyStatus({ id: 'job-1', status: 'processing' });
      replyStatus({ id: 'job-1', status: 'completed', text: 'hello world' });

      const result = await createClient().pollUntilDone('job-1');

      expect(result).toEqual({ ok: true, value: 'hello world' });
      agent.assertNoPendingInterceptors();
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(3000, undefined);
    });

    it('stops at the first error status without polling again', async () => {
      replyStatus({ id: 'job-1', status: 'error', error: 'File does not appear to contain audio' });
      replyStatus({ id: 'job-1', status: 'processing' });

      const result = await createClient().pollUntilDone('job-1');

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'TranscriptionFailed',
          message: 'Transcription failed: File does not appear to contain audio',
        },
      });
      expect(agent.pendingInterceptors()).toHaveLength(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('times out after the full attempt budget and interval, not before', async () => {
      agent
        .get(BASE_URL)
        .intercept({ path: '/v2/transcript/job-1', method: 'GET' })
        .reply(200, { id: 'job-1', status: 'processing' })
        .times(120);

      const result = await createClient().pollUntilDone('job-1');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'TranscriptionTimeout', message: 'Transcription timed out' },
      });
      agent.assertNoPendingInterceptors();
      expect(sleep).toHaveBeenCalledTimes(120);
      const slept = sleep.mock.calls.reduce((total, [ms]) => total + ms, 0);
      expect(slept).toBe(120 * 3000);
    });

    it('honours a custom attempt budget and interval', async () => {
      agent
        .get(BASE_URL)
        .intercept({ path: '/v2/transcript/job-1', method: 'GET' })
        .reply(200, { id: 'job-1', status: 'queued' })
        .times(2);

      const result = await createClient({ maxPollAttempts: 2, pollIntervalMs: 10 }).pollUntilDone('job-1');

      expect(result.ok).toBe(false);
      expect(sleep.mock.calls).toEqual([
        [10, undefined],
        [10, undefined],
      ]);
    });

    it('fails with PollFailed when the status request is rejected', async () => {
      agent.get(BASE_URL).intercept({ path: '/v2/transcript/job-1', method: 'GET' }).reply(404, 'Transcript not found');

      await expect(createClient().pollUntilDone('job-1')).resolves.toEqual({
        ok: false,
        error: { kind: 'PollFailed', message: 'Failed to poll transcription: Transcript not found' },
      });
    });

    it('fails with PollFailed when the body has no status', async () => {
      replyStatus({ id: 'job-1' });

      await expect(createClient().pollUntilDone('job-1')).resolves.toEqual({
        ok: false,
        error: { kind: 'PollFailed', message: 'Failed to poll transcription: unexpected response {"id":"job-1"}' },
      });
    });

    it('stops with Cancelled once the signal is aborted', async () => {
      replyStatus({ id: 'job-1', status: 'processing' });
      replyStatus({ id: 'job-1', status: 'processing' });
      const controller = new AbortController();
      sleep.mockImplementation(async () => {
        controller.abort();
      });

      const result = await createClient().pollUntilDone('job-1', controller.signal);

      expect(result).toEqual({ ok: false, error: { kind: 'Cancelled', message: 'Transcription cancelled' } });
      expect(agent.pendingInterceptors()).toHaveLength(1);
    });

    it('reports Cancelled when the wait itself is interrupted', async () => {
      replyStatus({ id: 'job-1', status: 'processing' });
      const controller = new AbortController();
      sleep.mockImplementation(async () => {
        controller.abort();
        throw new DOMException('The operation was aborted', 'AbortError');
      });

      const result = await createClient().pollUntilDone('job-1', controller.signal);

      expect(result).toEqual({ ok: false, error: { kind: 'Cancelled', message: 'Transcription cancelled' } });
    });
  });

  describe('transcribe', () => {
    it('does not create a job when cancelled before the submit', async () => {
      const pool = agent.get(BASE_URL);
      pool.intercept({ path: '/v2/transcript', method: 'POST' }).reply(200, { id: 'job-1' });
      const controller = new AbortController();
      controller.abort();

      const result = await createClient().transcribe('https://cdn.aai.test/upload/1', controller.signal);

      expect(result).toEqual({ ok: false, error: { kind: 'Cancelled', message: 'Transcription cancelled' } });
      expect(agent.pendingInterceptors()).toHaveLength(1);
    });

    it('submits and then polls the created job', async () => {
      const pool = agent.get(BASE_URL);
      pool.intercept({ path: '/v2/transcript', method: 'POST' }).reply(200, { id: 'job-1' });
      pool.intercept({ path: '/v2/transcript/job-1', method: 'GET' }).reply(200, { status: 'completed', text: 'done' });

      await expect(createClient().transcribe('https://cdn.aai.test/upload/1')).resolves.toEqual({
        ok: true,
        value: 'done',
      });
    });

    it('does not poll when the submit fails', async () => {
      const pool = agent.get(BASE_URL);
      pool.intercept({ path: '/v2/transcript', method: 'POST' }).reply(500, 'internal');
      pool.intercept({ path: '/v2/transcript/job-1', method: 'GET' }).reply(200, { status: 'completed', text: 'x' });

      const result = await createClient().transcribe('https://cdn.aai.test/upload/1');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'SubmitFailed', message: 'Failed to submit transcription: internal' },
      });
      expect(agent.pendingInterceptors()).toHaveLength(1);
    });
  });
});
