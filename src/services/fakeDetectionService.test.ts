import { describe, it, expect, vi, afterEach } from 'vitest';
import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';
import { ComplaintForDetection, FakeDetectionService } from './fakeDetectionService';

const complaint: ComplaintForDetection = {
  description: 'Streetlight out on the corner of Elm and 3rd',
  issueType: 'streetlight',
  location: 'Elm & 3rd',
  recentComplaints: [{ description: 'Pothole near the school', location: 'Oak Ave' }],
};

const detectorReturning = (data: unknown, requests: unknown[] = []) =>
  axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      requests.push(typeof config.data === 'string' ? JSON.parse(config.data) : config.data);
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });

const detectorFailing = (error: (config: InternalAxiosRequestConfig) => Error) =>
  axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      throw error(config);
    },
  });

describe('FakeDetectionService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('is disabled without a detector URL', async () => {
    const service = new FakeDetectionService(undefined);
    expect(service.enabled).toBe(false);
    await expect(service.check(complaint)).resolves.toEqual({ fake: false, score: 0, success: false });
  });

  it('sends the complaint with recent reports', async () => {
    const requests: unknown[] = [];
    const service = new FakeDetectionService(undefined, 0.5, detectorReturning({ score: 0.1 }, requests));

    await service.check(complaint);

    expect(requests).toEqual([
      {
        text: 'Streetlight out on the corner of Elm and 3rd',
        issue_type: 'streetlight',
        location: 'Elm & 3rd',
        recent_reports: [{ description: 'Pothole near the school', location: 'Oak Ave' }],
      },
    ]);
  });

  it('flags scores at or above the threshold', async () => {
    const at = new FakeDetectionService(undefined, 0.7, detectorReturning({ score: 0.7 }));
    const below = new FakeDetectionService(undefined, 0.7, detectorReturning({ score: 0.69 }));

    await expect(at.check(complaint)).resolves.toEqual({ fake: true, score: 0.7, success: true });
    await expect(below.check(complaint)).resolves.toEqual({ fake: false, score: 0.69, success: true });
  });

  it('trusts an explicit verdict from the detector', async () => {
    const service = new FakeDetectionService(undefined, 0.5, detectorReturning({ score: 0.9, fake: false }));
    await expect(service.check(complaint)).resolves.toEqual({ fake: false, score: 0.9, success: true });
  });

  it('clamps scores into range', async () => {
    const service = new FakeDetectionService(undefined, 0.5, detectorReturning({ score: 3 }));
    await expect(service.check(complaint)).resolves.toEqual({ fake: true, score: 1, success: true });
  });

  it('treats a malformed response as not checked', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const service = new FakeDetectionService(undefined, 0.5, detectorReturning({ verdict: 'fake' }));

    await expect(service.check(complaint)).resolves.toEqual({ fake: false, score: 0, success: false });
    expect(errors).toHaveBeenCalledTimes(1);
  });

  it('lets the complaint through when the detector returns an error', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const service = new FakeDetectionService(
      undefined,
      0.5,
      detectorFailing(
        config =>
          new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', config, null, {
            data: {},
            status: 503,
            statusText: 'Service Unavailable',
            headers: {},
            config,
          })
      )
    );

    await expect(service.check(complaint)).resolves.toEqual({ fake: false, score: 0, success: false });
    expect(errors).toHaveBeenCalledWith('❌ Fake detector error: 503 Service Unavailable');
  });

  it('lets the complaint through when the detector is unreachable', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const service = new FakeDetectionService(undefined, 0.5, detectorFailing(() => new Error('connect ECONNREFUSED')));

    await expect(service.check(complaint)).resolves.toEqual({ fake: false, score: 0, success: false });
    expect(errors).toHaveBeenCalledWith('❌ Fake detector unreachable:', 'connect ECONNREFUSED');
  });
});
