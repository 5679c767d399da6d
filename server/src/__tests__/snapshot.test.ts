import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadSnapshot, parseSnapshot } from '../data/snapshot';
import { InvalidFieldError, MissingFieldError, RecordValidationError } from '../lib/errors';
import { FIXTURE_PATH, loadFixture } from './helpers';

function rawMember(overrides: Record<string, unknown> = {}) {
  return {
    uuid: 'u-1',
    legacyCmisId: 101,
    age: 30,
    sex: 'F',
    isMember: true,
    householdAnchorPersonUuid: 'h-1',
    isSingleAdult: false,
    isYoungSingleAdult: false,
    birth: { date: { calc: '1994-03-02' } },
    ...overrides,
  };
}

function rawSnapshot(overrides: Record<string, unknown> = {}) {
  return { member_list: [rawMember()], callings: [], recommend_status: [], ...overrides };
}

function validationError(raw: unknown): RecordValidationError {
  try {
    parseSnapshot(raw);
  } catch (error) {
    if (error instanceof RecordValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the snapshot to be rejected');
}

describe('parseSnapshot', () => {
  const snapshot = loadFixture();

  it('normalizes member records', () => {
    expect(snapshot.members).toHaveLength(44);
    expect(snapshot.members[0]).toEqual({
      id: '00000000-0000-4000-8000-000000000001',
      legacy_id: 3100000000,
      age: 67,
      sex: 'M',
      is_member: true,
      household_id: '00000000-0000-4000-9000-000000000001',
      priesthood_office: 'HIGH_PRIEST',
      is_single_adult: true,
      is_young_single_adult: false,
      birth_date: '1957-01-15',
    });
  });

  it('reads an absent priesthood office as null', () => {
    const ruth = snapshot.members[14];
    expect(ruth.sex).toBe('F');
    expect(ruth.priesthood_office).toBeNull();
  });

  it('drops vacant callings', () => {
    const bishopric = snapshot.callings[0].children[0].callings;
    expect(bishopric.map((c) => c.position)).toEqual(['Bishop', 'Bishopric First Counselor']);
  });

  it('normalizes recommend records', () => {
    expect(snapshot.recommendStatus).toHaveLength(31);
    expect(snapshot.recommendStatus[6]).toEqual({
      legacy_member_id: 3100174218,
      recommend_status: null,
      endowment_date: null,
    });
  });

  it('carries ministering data through', () => {
    expect(snapshot.ministering).toEqual({ elders: [], reliefSociety: [] });
  });

  it('rejects a member without single-adult flags', () => {
    const member: Record<string, unknown> = rawMember();
    delete member.isSingleAdult;
    delete member.isYoungSingleAdult;
    const error = validationError(rawSnapshot({ member_list: [member] }));
    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error.path).toBe('member_list.0.isSingleAdult');
  });

  it.each([
    ['age', 'member_list.0.age'],
    ['sex', 'member_list.0.sex'],
    ['legacyCmisId', 'member_list.0.legacyCmisId'],
    ['householdAnchorPersonUuid', 'member_list.0.householdAnchorPersonUuid'],
    ['birth', 'member_list.0.birth'],
    ['isSingleAdult', 'member_list.0.isSingleAdult'],
    ['isYoungSingleAdult', 'member_list.0.isYoungSingleAdult'],
  ])('rejects a member without %s', (field, expectedPath) => {
    const member: Record<string, unknown> = rawMember();
    delete member[field];
    const error = validationError(rawSnapshot({ member_list: [member] }));
    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error.path).toBe(expectedPath);
    expect(error.message).toBe(`Missing required field: ${expectedPath}`);
  });

  it.each<[string, unknown]>([
    ['sex', 'X'],
    ['age', -1],
    ['age', 30.5],
    ['age', '30'],
    ['isMember', 'yes'],
  ])('rejects a member whose %s is %p', (field, value) => {
    const error = validationError(rawSnapshot({ member_list: [rawMember({ [field]: value })] }));
    expect(error).toBeInstanceOf(InvalidFieldError);
    expect(error.path).toBe(`member_list.0.${field}`);
  });

  it('rejects a malformed birth date', () => {
    const error = validationError(rawSnapshot({ member_list: [rawMember({ birth: { date: { calc: '3/2/1994' } } })] }));
    expect(error).toBeInstanceOf(InvalidFieldError);
    expect(error.path).toBe('member_list.0.birth.date.calc');
  });

  it('rejects a calling without a member id', () => {
    const error = validationError(rawSnapshot({ callings: [{ children: [{ callings: [{ position: 'Ward Clerk' }] }] }] }));
    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error.path).toBe('callings.0.children.0.callings.0.memberId');
  });

  it('rejects a recommend record without a member id', () => {
    const error = validationError(rawSnapshot({ recommend_status: [{ recommendStatus: 'ACTIVE' }] }));
    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error.path).toBe('recommend_status.0.memberId');
  });

  it('rejects a snapshot without a member list', () => {
    const error = validationError({ callings: [], recommend_status: [] });
    expect(error).toBeInstanceOf(MissingFieldError);
    expect(error.path).toBe('member_list');
  });

  it('rejects something that is not a snapshot at all', () => {
    expect(validationError(42).path).toBe('$');
    expect(validationError(null)).toBeInstanceOf(InvalidFieldError);
  });
});

describe('loadSnapshot', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ward-report-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads and parses a snapshot file', async () => {
    const snapshot = await loadSnapshot(FIXTURE_PATH);
    expect(snapshot.members).toHaveLength(44);
  });

  it('rejects a file that is not JSON', async () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{ "member_list": [');
    await expect(loadSnapshot(file)).rejects.toBeInstanceOf(InvalidFieldError);
  });

  it('passes file system errors through', async () => {
    await expect(loadSnapshot(path.join(dir, 'missing.json'))).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
