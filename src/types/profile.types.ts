export interface UserProfile {
  age: number | null;
  gender: string | null;
  conditions: string[];
  medications: string[];
  allergies: string[];
}

export interface UpdateProfileDto {
  age?: number | null;
  gender?: string | null;
  conditions?: string[];
  medications?: string[];
  allergies?: string[];
}
