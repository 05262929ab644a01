import axios, { AxiosInstance } from 'axios';
import { getErrorMessage } from '../utils/dbErrorHandler';

export interface FakeVerdict {
  fake: boolean;
  score: number; // 0..1, higher means more likely fake
  success: boolean; // false when the detector could not be consulted
}

export interface ComplaintForDetection {
  description: string;
  issueType: string;
  location: string | null;
  recentComplaints: { description: string; location: string | null }[];
}

export const NOT_CHECKED: FakeVerdict = { fake: false, score: 0, success: false };

/**
 * Client for the external fake-complaint detector. The detector itself is
 * another service; this only asks for its verdict and never blocks a
 * submission when it is unavailable.
 */
export class FakeDetectionService {
  private http: AxiosInstance | null;
  private threshold: number;

  constructor(baseURL: string | undefined, threshold = 0.5, http?: AxiosInstance) {
    this.threshold = threshold;
    this.http = http ?? (baseURL ? axios.create({ baseURL, timeout: 5000 }) : null);
  }

  get enabled(): boolean {
    return this.http !== null;
  }

  async check(complaint: ComplaintForDetection): Promise<FakeVerdict> {
    if (!this.http) return NOT_CHECKED;

    try {
      const response = await this.http.post<unknown>('', {
        text: complaint.description,
        issue_type: complaint.issueType,
        location: complaint.location,
        recent_reports: complaint.recentComplaints,
      });
      return this.parseVerdict(response.data);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        console.error(`❌ Fake detector error: ${error.response.status} ${error.response.statusText}`);
      } else {
        console.error('❌ Fake detector unreachable:', getErrorMessage(error));
      }
      return NOT_CHECKED;
    }
  }

  private parseVerdict(data: unknown): FakeVerdict {
    if (typeof data !== 'object' || data === null || !('score' in data) || typeof data.score !== 'number') {
      console.error('Failed to parse fake detector response:', data);
      return NOT_CHECKED;
    }

    const score = Math.min(1, Math.max(0, data.score));
    const fake = 'fake' in data && typeof data.fake === 'boolean' ? data.fake : score >= this.threshold;
    return { fake, score, success: true };
  }
}

const parseThreshold = (raw: string | undefined): number => {
  const value = Number(raw);
  return raw && Number.isFinite(value) ? value : 0.5;
};

export const fakeDetectionService = new FakeDetectionService(
  process.env.FAKE_DETECTOR_URL,
  parseThreshold(process.env.FAKE_SCORE_THRESHOLD)
);
