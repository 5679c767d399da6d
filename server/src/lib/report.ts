import { z } from 'zod';
import { CallingGroup, Member, RecommendStatus } from '../types';
import {
  ageCohorts,
  callingFinderMaker,
  callingSplitter,
  endowedSplitter,
  maleSplitter,
  memberSplitter,
  priesthoodGrouper,
  primaryCohorts,
  recommendFinderMaker,
  recommendStatusGrouper,
  singlesByAge,
  youthByYearSplitter,
} from './classify';
import { InvalidReportError } from './errors';
import { groupBy } from './partition';

const count = z.number().int().nonnegative();

const reportSchema = z
  .object({
    members: count,
    non_members: count,
    households: count,
    primary: count,
    youth: count,
    adults: count,
    youth_by_year: count,
    primary_nursery: count,
    primary_pre_baptism: count,
    primary_baptism_eligible: count,
    young_men: count,
    young_women: count,
    brethren: count,
    sisters: count,
    brethren_with_calling: count,
    brethren_without_calling: count,
    sisters_with_calling: count,
    sisters_without_calling: count,
    brethren_high_priest: count,
    brethren_elder: count,
    brethren_priest: count,
    brethren_teacher: count,
    brethren_deacon: count,
    brethren_unordained: count,
    brethren_melchizedek: count,
    brethren_aaronic: count,
    young_men_high_priest: count,
    young_men_elder: count,
    young_men_priest: count,
    young_men_teacher: count,
    young_men_deacon: count,
    young_men_unordained: count,
    single_adults: count,
    single_adults_18_30: count,
    single_adults_31_45: count,
    single_adults_46_plus: count,
    single_adults_unclassified: count,
    endowed: count,
    not_endowed: count,
    recommend_active: count,
    recommend_canceled: count,
    recommend_expired_less_than_1_month: count,
    recommend_expired_less_than_3_months: count,
    recommend_expired_over_3_months: count,
    recommend_expiring_next_month: count,
    recommend_expiring_this_month: count,
    recommend_lost_or_stolen: count,
    current_recommend: count,
    expired_recommend: count,
  })
  .strict();

export const REPORT_FIELDS = reportSchema.keyof().options;

export type ReportField = (typeof REPORT_FIELDS)[number];

export type ReportModel = Readonly<z.infer<typeof reportSchema>>;

/**
 * Validate and freeze a set of counts. The key set is closed: a missing or
 * unknown field is rejected. Also used for reports read back from storage.
 */
export function createReportModel(counts: unknown): ReportModel {
  const result = reportSchema.safeParse(counts);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new InvalidReportError(field ? `Report field ${field}: ${issue.message}` : issue.message);
  }
  return Object.freeze(result.data);
}

export interface ReportInput {
  members: readonly Member[];
  callings: readonly CallingGroup[];
  recommendStatus: readonly RecommendStatus[];
}

export interface ReportOptions {
  // Reference date for calendar-year ages.
  referenceDate: Date;
}

export function buildReport(input: ReportInput, options: ReportOptions): ReportModel {
  const findCallings = callingFinderMaker(input.callings);
  const findRecommend = recommendFinderMaker(input.recommendStatus);

  const [members, nonMembers] = memberSplitter(input.members);
  const households = groupBy((m) => m.household_id, input.members);

  const { primary, youth, adults } = ageCohorts(members);
  const { nursery, preBaptism, baptismEligible } = primaryCohorts(primary);
  const [youthByYear] = youthByYearSplitter(members, options.referenceDate);

  const [youngMen, youngWomen] = maleSplitter(youth);
  const [brethren, sisters] = maleSplitter(adults);

  const [brethrenCalled, brethrenNotCalled] = callingSplitter(findCallings, brethren);
  const [sistersCalled, sistersNotCalled] = callingSplitter(findCallings, sisters);

  const brethrenOffices = priesthoodGrouper(brethren);
  const youngMenOffices = priesthoodGrouper(youngMen);

  const singles = singlesByAge(adults);

  const [endowed, notEndowed] = endowedSplitter(findRecommend, adults);
  const recommends = recommendStatusGrouper(input.recommendStatus);

  const counts: Record<ReportField, number> = {
    members: members.length,
    non_members: nonMembers.length,
    households: households.size,
    primary: primary.length,
    youth: youth.length,
    adults: adults.length,
    youth_by_year: youthByYear.length,
    primary_nursery: nursery.length,
    primary_pre_baptism: preBaptism.length,
    primary_baptism_eligible: baptismEligible.length,
    young_men: youngMen.length,
    young_women: youngWomen.length,
    brethren: brethren.length,
    sisters: sisters.length,
    brethren_with_calling: brethrenCalled.length,
    brethren_without_calling: brethrenNotCalled.length,
    sisters_with_calling: sistersCalled.length,
    sisters_without_calling: sistersNotCalled.length,
    brethren_high_priest: brethrenOffices.HIGH_PRIEST.length,
    brethren_elder: brethrenOffices.ELDER.length,
    brethren_priest: brethrenOffices.PRIEST.length,
    brethren_teacher: brethrenOffices.TEACHER.length,
    brethren_deacon: brethrenOffices.DEACON.length,
    brethren_unordained: brethrenOffices.UNORDAINED.length,
    brethren_melchizedek: brethrenOffices.HIGH_PRIEST.length + brethrenOffices.ELDER.length,
    brethren_aaronic:
      brethrenOffices.PRIEST.length + brethrenOffices.TEACHER.length + brethrenOffices.DEACON.length,
    young_men_high_priest: youngMenOffices.HIGH_PRIEST.length,
    young_men_elder: youngMenOffices.ELDER.length,
    young_men_priest: youngMenOffices.PRIEST.length,
    young_men_teacher: youngMenOffices.TEACHER.length,
    young_men_deacon: youngMenOffices.DEACON.length,
    young_men_unordained: youngMenOffices.UNORDAINED.length,
    single_adults: singles.singles.length,
    single_adults_18_30: singles.from18.length,
    single_adults_31_45: singles.from31.length,
    single_adults_46_plus: singles.from46.length,
    single_adults_unclassified: singles.unclassified.length,
    endowed: endowed.length,
    not_endowed: notEndowed.length,
    recommend_active: recommends.ACTIVE.length,
    recommend_canceled: recommends.CANCELED.length,
    recommend_expired_less_than_1_month: recommends.EXPIRED_LESS_THAN_1_MONTH.length,
    recommend_expired_less_than_3_months: recommends.EXPIRED_LESS_THAN_3_MONTHS.length,
    recommend_expired_over_3_months: recommends.EXPIRED_OVER_3_MONTHS.length,
    recommend_expiring_next_month: recommends.EXPIRING_NEXT_MONTH.length,
    recommend_expiring_this_month: recommends.EXPIRING_THIS_MONTH.length,
    recommend_lost_or_stolen: recommends.LOST_OR_STOLEN.length,
    current_recommend:
      recommends.ACTIVE.length + recommends.EXPIRING_NEXT_MONTH.length + recommends.EXPIRING_THIS_MONTH.length,
    expired_recommend:
      recommends.CANCELED.length +
      recommends.EXPIRED_LESS_THAN_1_MONTH.length +
      recommends.EXPIRED_LESS_THAN_3_MONTHS.length +
      recommends.EXPIRED_OVER_3_MONTHS.length,
  };

  return createReportModel(counts);
}
