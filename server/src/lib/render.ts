import { ReportModel } from './report';

// Exact halves go to the even neighbour: 12.5 -> 12, 37.5 -> 38.
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor === 0.5) {
    return floor % 2 === 0 ? floor : floor + 1;
  }
  return Math.round(value);
}

/**
 * Whole-number percentage with a trailing `%`. A zero denominator gives `0%`.
 */
export function percent(top: number, bottom: number): string {
  if (bottom === 0) {
    return '0%';
  }
  return `${roundHalfEven((top / bottom) * 100).toLocaleString('en-US')}%`;
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function reportFileName(generatedAt: Date): string {
  return `ward-report-${formatDate(generatedAt)}.txt`;
}

export interface RenderOptions {
  title?: string;
  generatedAt: Date;
}

function stat(depth: number, label: string, count: number, of?: number): string {
  const indent = '  '.repeat(depth);
  return of === undefined ? `${indent}${label}: ${count}` : `${indent}${label}: ${count} (${percent(count, of)})`;
}

export function renderReport(report: ReportModel, options: RenderOptions): string {
  const r = report;
  const lines = [
    options.title ?? 'Ward Membership Report',
    `Generated ${formatDate(options.generatedAt)}`,
    '',
    'MEMBERSHIP',
    stat(1, 'Members', r.members),
    stat(1, 'Non-members on record', r.non_members),
    stat(1, 'Households', r.households),
    '',
    'PRIMARY',
    stat(1, 'Children under 12', r.primary, r.members),
    stat(2, 'Nursery (0-2)', r.primary_nursery, r.primary),
    stat(2, 'Ages 3-7', r.primary_pre_baptism, r.primary),
    stat(2, 'Ages 8-11', r.primary_baptism_eligible, r.primary),
    '',
    'YOUTH',
    stat(1, 'Youth 12-17', r.youth, r.members),
    stat(2, 'Young men', r.young_men, r.youth),
    stat(2, 'Young women', r.young_women, r.youth),
    stat(1, 'Youth by calendar year', r.youth_by_year),
    '',
    'ADULTS',
    stat(1, 'Adults 18 and over', r.adults, r.members),
    stat(2, 'Brethren', r.brethren, r.adults),
    stat(2, 'Sisters', r.sisters, r.adults),
    stat(1, 'Endowed', r.endowed, r.adults),
    stat(1, 'Not endowed', r.not_endowed, r.adults),
    '',
    'PRIESTHOOD',
    stat(1, 'Melchizedek', r.brethren_melchizedek, r.brethren),
    stat(2, 'High priests', r.brethren_high_priest, r.brethren),
    stat(2, 'Elders', r.brethren_elder, r.brethren),
    stat(1, 'Aaronic', r.brethren_aaronic, r.brethren),
    stat(2, 'Priests', r.brethren_priest, r.brethren),
    stat(2, 'Teachers', r.brethren_teacher, r.brethren),
    stat(2, 'Deacons', r.brethren_deacon, r.brethren),
    stat(1, 'Unordained', r.brethren_unordained, r.brethren),
    stat(1, 'Young men', r.young_men),
    stat(2, 'Priests', r.young_men_priest, r.young_men),
    stat(2, 'Teachers', r.young_men_teacher, r.young_men),
    stat(2, 'Deacons', r.young_men_deacon, r.young_men),
    stat(2, 'Unordained', r.young_men_unordained, r.young_men),
    '',
    'CALLINGS',
    stat(1, 'Brethren with a calling', r.brethren_with_calling, r.brethren),
    stat(1, 'Brethren without a calling', r.brethren_without_calling, r.brethren),
    stat(1, 'Sisters with a calling', r.sisters_with_calling, r.sisters),
    stat(1, 'Sisters without a calling', r.sisters_without_calling, r.sisters),
    '',
    'SINGLE ADULTS',
    stat(1, 'Single adults', r.single_adults, r.adults),
    stat(2, 'Ages 18-30', r.single_adults_18_30, r.single_adults),
    stat(2, 'Ages 31-45', r.single_adults_31_45, r.single_adults),
    stat(2, 'Ages 46 and over', r.single_adults_46_plus, r.single_adults),
  ];

  if (r.single_adults_unclassified > 0) {
    lines.push(stat(2, 'Outside every age band', r.single_adults_unclassified, r.single_adults));
  }

  lines.push(
    '',
    'TEMPLE RECOMMENDS',
    stat(1, 'Current', r.current_recommend),
    stat(2, 'Active', r.recommend_active),
    stat(2, 'Expiring this month', r.recommend_expiring_this_month),
    stat(2, 'Expiring next month', r.recommend_expiring_next_month),
    stat(1, 'Expired', r.expired_recommend),
    stat(2, 'Less than 1 month', r.recommend_expired_less_than_1_month),
    stat(2, 'Less than 3 months', r.recommend_expired_less_than_3_months),
    stat(2, 'Over 3 months', r.recommend_expired_over_3_months),
    stat(2, 'Canceled', r.recommend_canceled),
    stat(1, 'Lost or stolen', r.recommend_lost_or_stolen),
    ''
  );

  return lines.join('\n');
}
