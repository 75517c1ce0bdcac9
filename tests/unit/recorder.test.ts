import test from 'node:test';
import assert from 'node:assert';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  StreamRecorder,
  chooseRecordingExtension,
  formatRecordingTimestamp,
  toSafeExtensionFromContentType,
  toSafeRecordingName
} from '../../src/recorder';
import { UserInputError } from '../../src/security';
import { delay, fakeFetch, text, trackedBody } from './helpers';

const STARTED_AT = new Date(2024, 0, 2, 3, 4, 5);

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'stationcheck-recordings-'));
}

test('toSafeRecordingName: keeps letters, digits, spaces, dashes and underscores', () => {
  assert.strictEqual(toSafeRecordingName('Jazz FM / Paris!'), 'Jazz FM  Paris');
  assert.strictEqual(toSafeRecordingName('Radio Österreich 1'), 'Radio Österreich 1');
  assert.strictEqual(toSafeRecordingName('***'), 'recording');
});

test('formatRecordingTimestamp: zero-padded local time', () => {
  assert.strictEqual(formatRecordingTimestamp(STARTED_AT), '20240102_030405');
});

test('chooseRecordingExtension: URL first, then content type, then mp3', () => {
  assert.strictEqual(chooseRecordingExtension('http://radio.example/live', 'http://cdn.example/live.aac', 'audio/mpeg'), '.aac');
  assert.strictEqual(chooseRecordingExtension('http://radio.example/live.OGG', 'http://cdn.example/live', null), '.ogg');
  assert.strictEqual(chooseRecordingExtension('http://radio.example/live.m3u8', 'http://cdn.example/live', 'audio/mpeg'), '.mp3');
  assert.strictEqual(chooseRecordingExtension('http://radio.example/live', 'http://radio.example/live', 'video/webm'), '.webm');
  assert.strictEqual(chooseRecordingExtension('http://radio.example/live', 'http://radio.example/live', null), '.mp3');
});

test('toSafeExtensionFromContentType: prefers player-friendly extensions', () => {
  assert.strictEqual(toSafeExtensionFromContentType('audio/mpeg; charset=binary'), '.mp3');
  assert.strictEqual(toSafeExtensionFromContentType('audio/aacp'), '.aac');
  assert.strictEqual(toSafeExtensionFromContentType('application/x-not-registered'), '');
  assert.strictEqual(toSafeExtensionFromContentType(null), '');
});

test('StreamRecorder: a stream that ends by itself is finished', async () => {
  const dir = tempDir();
  const { fetch, calls } = fakeFetch(
    () =>
      new Response(trackedBody([text('abc'), text('def')]).stream, {
        status: 200,
        headers: { 'Content-Type': 'audio/mpeg' }
      })
  );
  const recorder = new StreamRecorder({ recordingsDir: dir, fetch, now: () => STARTED_AT });

  const started = await recorder.start('http://radio.example/live', 'Jazz FM / Paris!');
  await recorder.settled(started.id);

  const expectedPath = path.join(dir, 'Jazz FM  Paris_20240102_030405.mp3');
  assert.strictEqual(started.status, 'recording');
  assert.strictEqual(started.filePath, expectedPath);
  assert.deepStrictEqual(recorder.get(started.id), {
    ...started,
    status: 'finished',
    sizeBytes: 6
  });
  assert.strictEqual(fs.readFileSync(expectedPath, 'utf8'), 'abcdef');
  assert.strictEqual(calls[0].headers.get('user-agent'), 'RadioBrowserPlayer/1.0');
});

test('StreamRecorder: stopping keeps what was written', async () => {
  const dir = tempDir();
  const body = trackedBody([text('first-chunk')], { keepOpen: true });
  const { fetch } = fakeFetch(
    () => new Response(body.stream, { status: 200, headers: { 'Content-Type': 'audio/aacp' } })
  );
  const recorder = new StreamRecorder({ recordingsDir: dir, fetch, now: () => STARTED_AT });

  const started = await recorder.start('http://radio.example/live', 'Night Shift');
  await delay(50);
  const stopped = await recorder.stop(started.id);

  assert.strictEqual(stopped?.status, 'stopped');
  assert.strictEqual(stopped?.sizeBytes, 11);
  assert.strictEqual(stopped?.filePath, path.join(dir, 'Night Shift_20240102_030405.aac'));
  assert.strictEqual(fs.readFileSync(path.join(dir, 'Night Shift_20240102_030405.aac'), 'utf8'), 'first-chunk');
  assert.strictEqual(body.cancelled(), true);
});

test('StreamRecorder: an error status fails the recording without a file', async () => {
  const dir = tempDir();
  const { fetch } = fakeFetch(() => new Response(null, { status: 404 }));
  const recorder = new StreamRecorder({ recordingsDir: dir, fetch });

  const recording = await recorder.start('http://radio.example/gone', 'Gone');

  assert.strictEqual(recording.status, 'error');
  assert.strictEqual(recording.reason, 'Stream answered HTTP 404.');
  assert.strictEqual(recording.filePath, null);
  assert.deepStrictEqual(fs.readdirSync(dir), []);
});

test('StreamRecorder: an unusable recordings directory fails the recording and releases the stream', async () => {
  const notADirectory = path.join(tempDir(), 'not-a-dir');
  fs.writeFileSync(notADirectory, '');
  const body = trackedBody([text('audio')], { keepOpen: true });
  const { fetch } = fakeFetch(
    () => new Response(body.stream, { status: 200, headers: { 'Content-Type': 'audio/mpeg' } })
  );
  const recorder = new StreamRecorder({ recordingsDir: notADirectory, fetch });

  const recording = await recorder.start('http://radio.example/live', 'Blocked');

  assert.strictEqual(recording.status, 'error');
  assert.match(recording.reason ?? '', /^EEXIST/);
  assert.strictEqual(recording.filePath, null);
  assert.strictEqual(body.cancelled(), true);
  assert.deepStrictEqual(
    recorder.list().map((entry) => entry.status),
    ['error']
  );
});

test('StreamRecorder: transport failures fail the recording', async () => {
  const { fetch } = fakeFetch(() => {
    throw new TypeError('fetch failed');
  });
  const recorder = new StreamRecorder({ recordingsDir: tempDir(), fetch });

  const recording = await recorder.start('http://radio.example/live', 'Offline');

  assert.strictEqual(recording.status, 'error');
  assert.strictEqual(recording.reason, 'fetch failed');
  assert.deepStrictEqual(
    recorder.list().map((entry) => entry.id),
    [recording.id]
  );
});

test('StreamRecorder: invalid URLs are rejected up front', async () => {
  const recorder = new StreamRecorder({ recordingsDir: tempDir(), fetch: fakeFetch(() => new Response(null)).fetch });

  await assert.rejects(recorder.start('ftp://radio.example/live', 'Bad'), (error: unknown) => error instanceof UserInputError);
  assert.deepStrictEqual(recorder.list(), []);
});

test('StreamRecorder: unknown ids', async () => {
  const recorder = new StreamRecorder({ recordingsDir: tempDir() });

  assert.strictEqual(recorder.get('missing'), null);
  assert.strictEqual(await recorder.stop('missing'), null);
});
