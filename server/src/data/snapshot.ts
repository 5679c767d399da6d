import fs from 'fs/promises';
import { z } from 'zod';
import { InvalidFieldError, MissingFieldError, RecordValidationError } from '../lib/errors';
import { Snapshot } from '../types';

// Raw shapes as exported from the membership and clerk tools. Unknown keys
// are stripped.

const rawMemberSchema = z
  .object({
    uuid: z.string().min(1),
    legacyCmisId: z.number().int(),
    age: z.number().int().nonnegative(),
    sex: z.enum(['M', 'F']),
    isMember: z.boolean(),
    householdAnchorPersonUuid: z.string().min(1),
    priesthoodOffice: z.string().nullish(),
    isSingleAdult: z.boolean(),
    isYoungSingleAdult: z.boolean(),
    birth: z.object({
      date: z.object({
        calc: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
      }),
    }),
  })
  .transform((m) => ({
    id: m.uuid,
    legacy_id: m.legacyCmisId,
    age: m.age,
    sex: m.sex,
    is_member: m.isMember,
    household_id: m.householdAnchorPersonUuid,
    priesthood_office: m.priesthoodOffice ?? null,
    is_single_adult: m.isSingleAdult,
    is_young_single_adult: m.isYoungSingleAdult,
    birth_date: m.birth.date.calc,
  }));

// A null memberId is a vacant position.
const rawCallingSchema = z.object({
  memberId: z.number().int().nullable(),
  position: z.string().nullish(),
});

const rawCallingGroupSchema = z
  .object({
    name: z.string().nullish(),
    children: z.array(
      z.object({
        name: z.string().nullish(),
        callings: z.array(rawCallingSchema),
      })
    ),
  })
  .transform((group) => ({
    name: group.name ?? undefined,
    children: group.children.map((child) => ({
      name: child.name ?? undefined,
      callings: child.callings.flatMap((calling) =>
        calling.memberId === null
          ? []
          : [
              {
                legacy_member_id: calling.memberId,
                position: calling.position ?? undefined,
                organization: child.name ?? undefined,
              },
            ]
      ),
    })),
  }));

const rawRecommendSchema = z
  .object({
    memberId: z.number().int(),
    recommendStatus: z.string().nullish(),
    endowmentDate: z.string().nullish(),
  })
  .transform((r) => ({
    legacy_member_id: r.memberId,
    recommend_status: r.recommendStatus ?? null,
    endowment_date: r.endowmentDate ?? null,
  }));

const snapshotSchema = z
  .object({
    member_list: z.array(rawMemberSchema),
    callings: z.array(rawCallingGroupSchema),
    ministering: z.unknown().optional(),
    recommend_status: z.array(rawRecommendSchema),
  })
  .transform((raw) => ({
    members: raw.member_list,
    callings: raw.callings,
    recommendStatus: raw.recommend_status,
    ministering: raw.ministering,
  }));

function toValidationError(error: z.ZodError): RecordValidationError {
  const issue = error.issues[0];
  const path = issue.path.length > 0 ? issue.path.join('.') : '$';
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined) {
    return new MissingFieldError(path);
  }
  return new InvalidFieldError(path, issue.message);
}

/**
 * Validate an exported snapshot and normalize it to domain records. Fails on
 * the first bad record; there is no partial snapshot.
 */
export function parseSnapshot(raw: unknown): Snapshot {
  const result = snapshotSchema.safeParse(raw);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

export async function loadSnapshot(filePath: string): Promise<Snapshot> {
  const text = await fs.readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new InvalidFieldError('$', `${filePath} is not valid JSON`);
    }
    throw error;
  }
  return parseSnapshot(raw);
}
