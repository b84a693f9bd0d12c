import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import axios from 'axios';
import { makeSTT, speechContentType } from '../lib/stt';
import { testSettings } from './fixtures';

vi.mock('axios', () => {
  const mock = Object.assign(vi.fn(), {
    isAxiosError: (e: unknown) => typeof e === 'object' && e !== null && 'isAxiosError' in e,
  });
  return { __esModule: true, default: mock };
});
const mockAxios = axios as unknown as Mock;

const settings = testSettings({ AZURE_SPEECH_KEY: 'test-key', AZURE_REGION: 'eastus' });

describe('speechContentType', () => {
  it('keeps only codecs the short-audio endpoint accepts', () => {
    expect(speechContentType('voice.ogg')).toBe('audio/ogg; codecs=opus');
    expect(speechContentType('audio', 'audio/ogg; codecs=opus')).toBe('audio/ogg; codecs=opus');
    expect(speechContentType('speech.webm')).toBe('audio/webm');
    expect(speechContentType('clip', 'audio/wav')).toBe('audio/wav');
    expect(speechContentType('clip.mp3', 'application/octet-stream')).toBe('audio/mpeg');
    expect(speechContentType('clip')).toBe('audio/wav');
  });
});

describe('STT adapter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('returns the recognized text', async () => {
    mockAxios.mockResolvedValueOnce({ data: { RecognitionStatus: 'Success', DisplayText: ' Account kholna hai. ' } });

    const text = await makeSTT(settings).transcribe(new Uint8Array([1, 2]), 'speech.wav', 'audio/wav');

    expect(text).toBe('Account kholna hai.');
    expect(mockAxios).toHaveBeenCalledWith(
      expect.objectContaining({
        url: 'https://eastus.stt.speech.microsoft.com/speech/recognition/conversation/cognitiveservices/v1',
        params: { language: 'ur-PK', format: 'simple' },
        headers: expect.objectContaining({ 'Content-Type': 'audio/wav', 'Ocp-Apim-Subscription-Key': 'test-key' }),
      }),
    );
  });

  it('returns an empty transcript when nothing was recognized', async () => {
    mockAxios.mockResolvedValueOnce({ data: { RecognitionStatus: 'NoMatch' } });
    expect(await makeSTT(settings).transcribe(new Uint8Array([1]), 'speech.wav')).toBe('');
  });

  it('wraps provider failures', async () => {
    mockAxios.mockRejectedValueOnce({ isAxiosError: true, message: 'Bad Request', response: { status: 400 } });
    await expect(makeSTT(settings).transcribe(new Uint8Array([1]), 'x.wav')).rejects.toMatchObject({
      provider: 'azure-stt',
      status: 400,
    });
  });
});
