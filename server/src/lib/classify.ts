import { Calling, CallingGroup, Member, RecommendStatus } from '../types';
import { InvalidFieldError } from './errors';
import { multiPartition, partition } from './partition';

export const memberSplitter = (members: readonly Member[]) =>
  partition((m) => m.is_member === true, members);

export const adultSplitter = (members: readonly Member[]) => partition((m) => m.age >= 18, members);

export const maleSplitter = (members: readonly Member[]) => partition((m) => m.sex === 'M', members);

export const singleSplitter = (members: readonly Member[]) =>
  partition((m) => m.is_single_adult || m.is_young_single_adult, members);

export function ageCohorts(members: readonly Member[]) {
  const [primary, youth, adults] = multiPartition<Member>(
    [(m) => m.age < 12, (m) => m.age >= 12 && m.age <= 17, (m) => m.age > 17],
    members
  );
  return { primary, youth, adults };
}

export function primaryCohorts(children: readonly Member[]) {
  const [nursery, preBaptism, baptismEligible] = multiPartition<Member>(
    [(m) => m.age <= 2, (m) => m.age > 2 && m.age <= 7, (m) => m.age >= 8],
    children
  );
  return { nursery, preBaptism, baptismEligible };
}

/**
 * Single adults by age band. `unclassified` holds anyone outside the three
 * bands (it should be empty once the input is adult-only).
 */
export function singlesByAge(members: readonly Member[]) {
  const [singles] = singleSplitter(members);
  const [from18, from31, from46, unclassified] = multiPartition<Member>(
    [
      (m) => m.age >= 18 && m.age <= 30,
      (m) => m.age >= 31 && m.age <= 45,
      (m) => m.age >= 46,
      () => true,
    ],
    singles
  );
  return { singles, from18, from31, from46, unclassified };
}

/**
 * Age as of the reference year, counting from January 1 of the birth year.
 * Youth classes advance on this age rather than the birthday.
 */
export function yearAge(member: Member, referenceDate: Date): number {
  const birthYear = Number.parseInt(member.birth_date.split('-')[0], 10);
  if (Number.isNaN(birthYear)) {
    throw new InvalidFieldError(`member ${member.id} birth_date`, 'expected YYYY-MM-DD');
  }
  return referenceDate.getFullYear() - birthYear;
}

export const youthByYearSplitter = (members: readonly Member[], referenceDate: Date) =>
  partition((m) => {
    const age = yearAge(m, referenceDate);
    return age >= 12 && age < 18;
  }, members);

// Callings

export type CallingFinder = (member: Member) => Calling[];

export function callingsByMemberId(groups: readonly CallingGroup[]): Map<number, Calling[]> {
  const callings = new Map<number, Calling[]>();
  for (const group of groups) {
    for (const child of group.children) {
      for (const calling of child.callings) {
        const held = callings.get(calling.legacy_member_id);
        if (held) {
          held.push(calling);
        } else {
          callings.set(calling.legacy_member_id, [calling]);
        }
      }
    }
  }
  return callings;
}

/** Returns a lookup of a member's callings; empty when they hold none. */
export function callingFinderMaker(groups: readonly CallingGroup[]): CallingFinder {
  const callings = callingsByMemberId(groups);
  return (member) => callings.get(member.legacy_id) ?? [];
}

export const callingSplitter = (findCallings: CallingFinder, members: readonly Member[]) =>
  partition((m) => findCallings(m).length > 0, members);

// Priesthood

export const PRIESTHOODS = ['HIGH_PRIEST', 'ELDER', 'PRIEST', 'TEACHER', 'DEACON', 'UNORDAINED'] as const;

export type PriesthoodOffice = (typeof PRIESTHOODS)[number];

function isPriesthoodOffice(value: string | null): value is PriesthoodOffice {
  return PRIESTHOODS.some((office) => office === value);
}

/** Every member lands in exactly one office; anything unrecognized is UNORDAINED. */
export function priesthoodGrouper(members: readonly Member[]): Record<PriesthoodOffice, Member[]> {
  const groups: Record<PriesthoodOffice, Member[]> = {
    HIGH_PRIEST: [],
    ELDER: [],
    PRIEST: [],
    TEACHER: [],
    DEACON: [],
    UNORDAINED: [],
  };
  for (const member of members) {
    const office = isPriesthoodOffice(member.priesthood_office) ? member.priesthood_office : 'UNORDAINED';
    groups[office].push(member);
  }
  return groups;
}

// Temple recommends

export const RECOMMEND_STATUSES = [
  'ACTIVE',
  'CANCELED',
  'EXPIRED_LESS_THAN_1_MONTH',
  'EXPIRED_LESS_THAN_3_MONTHS',
  'EXPIRED_OVER_3_MONTHS',
  'EXPIRING_NEXT_MONTH',
  'EXPIRING_THIS_MONTH',
  'LOST_OR_STOLEN',
] as const;

export type RecommendStatusName = (typeof RECOMMEND_STATUSES)[number];

function isRecommendStatusName(value: string | null): value is RecommendStatusName {
  return RECOMMEND_STATUSES.some((status) => status === value);
}

export type RecommendFinder = (member: Member) => RecommendStatus | undefined;

export function recommendFinderMaker(statuses: readonly RecommendStatus[]): RecommendFinder {
  const byId = new Map<number, RecommendStatus>();
  for (const status of statuses) {
    byId.set(status.legacy_member_id, status);
  }
  return (member) => byId.get(member.legacy_id);
}

export const endowedSplitter = (findRecommend: RecommendFinder, members: readonly Member[]) =>
  partition((m) => Boolean(findRecommend(m)?.endowment_date), members);

/**
 * Group recommend records by status. Records without a recognized status
 * are left out; there is no catch-all bucket.
 */
export function recommendStatusGrouper(
  statuses: readonly RecommendStatus[]
): Record<RecommendStatusName, RecommendStatus[]> {
  const groups: Record<RecommendStatusName, RecommendStatus[]> = {
    ACTIVE: [],
    CANCELED: [],
    EXPIRED_LESS_THAN_1_MONTH: [],
    EXPIRED_LESS_THAN_3_MONTHS: [],
    EXPIRED_OVER_3_MONTHS: [],
    EXPIRING_NEXT_MONTH: [],
    EXPIRING_THIS_MONTH: [],
    LOST_OR_STOLEN: [],
  };
  for (const status of statuses) {
    if (isRecommendStatusName(status.recommend_status)) {
      groups[status.recommend_status].push(status);
    }
  }
  return groups;
}
