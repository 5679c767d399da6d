import fs from 'fs';
import path from 'path';
import { parseSnapshot } from '../data/snapshot';
import { Member, Snapshot } from '../types';

export const FIXTURE_PATH = path.join(__dirname, 'fixtures', 'ward.json');

// Calendar-year ages in the fixture are relative to this date.
export const REFERENCE_DATE = new Date('2024-06-15T12:00:00Z');

export function readFixture(): unknown {
  return JSON.parse(fs.readFileSync(FIXTURE_PATH, 'utf-8'));
}

export function loadFixture(): Snapshot {
  return parseSnapshot(readFixture());
}

let nextId = 1;

export function makeMember(overrides: Partial<Member> = {}): Member {
  const id = nextId++;
  return {
    id: `member-${id}`,
    legacy_id: 9000 + id,
    age: 30,
    sex: 'M',
    is_member: true,
    household_id: `household-${id}`,
    priesthood_office: null,
    is_single_adult: false,
    is_young_single_adult: false,
    birth_date: '1994-01-15',
    ...overrides,
  };
}
