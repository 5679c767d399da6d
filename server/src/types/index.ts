export type Sex = 'M' | 'F';

export interface Member {
  id: string;
  legacy_id: number;
  age: number;
  sex: Sex;
  is_member: boolean;
  household_id: string;
  priesthood_office: string | null;
  is_single_adult: boolean;
  is_young_single_adult: boolean;
  birth_date: string;
}

export interface Calling {
  legacy_member_id: number;
  position?: string;
  organization?: string;
}

export interface RecommendStatus {
  legacy_member_id: number;
  recommend_status: string | null;
  endowment_date: string | null;
}

// Callings arrive nested: organization -> sub-organization -> callings
export interface CallingSubGroup {
  name?: string;
  callings: Calling[];
}

export interface CallingGroup {
  name?: string;
  children: CallingSubGroup[];
}

export interface Snapshot {
  members: Member[];
  callings: CallingGroup[];
  recommendStatus: RecommendStatus[];
  ministering?: unknown;
}
