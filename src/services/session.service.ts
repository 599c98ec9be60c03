import { UpdateProfileDto, UserProfile } from '../types/profile.types';
import { PatientContext } from '../types/response.types';

const emptyProfile = (): UserProfile => ({
  age: null,
  gender: null,
  conditions: [],
  medications: [],
  allergies: [],
});

const cleanList = (items: string[] | undefined, fallback: string[]): string[] =>
  items === undefined ? fallback : items.map((item) => item.trim()).filter((item) => item.length > 0);

/**
 * In-memory query history and profile for the single local user.
 * Nothing here is persisted.
 */
export class SessionService {
  private history: string[] = [];
  private profile: UserProfile = emptyProfile();

  recordQuery(query: string): void {
    if (!this.history.includes(query)) {
      this.history.push(query);
    }
  }

  getHistory(limit?: number): string[] {
    if (limit === undefined) return [...this.history];
    return limit > 0 ? this.history.slice(-limit) : [];
  }

  getHistoryCount(): number {
    return this.history.length;
  }

  clearHistory(): void {
    this.history = [];
  }

  getProfile(): UserProfile {
    return {
      ...this.profile,
      conditions: [...this.profile.conditions],
      medications: [...this.profile.medications],
      allergies: [...this.profile.allergies],
    };
  }

  updateProfile(data: UpdateProfileDto): UserProfile {
    const current = this.profile;
    const age = data.age === undefined ? current.age : data.age;
    const gender = data.gender === undefined ? current.gender : data.gender;

    this.profile = {
      age: age !== null && age > 0 ? age : null,
      gender: gender ? gender : null,
      conditions: cleanList(data.conditions, current.conditions),
      medications: cleanList(data.medications, current.medications),
      allergies: cleanList(data.allergies, current.allergies),
    };

    return this.getProfile();
  }

  toPatientContext(): PatientContext {
    return this.getProfile();
  }
}
