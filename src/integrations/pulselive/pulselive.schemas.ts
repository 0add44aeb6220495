import { z } from 'zod';

/**
 * Upstream response shapes for footballapi.pulselive.com.
 *
 * Objects are parsed with zod's default strip behaviour, so fields the API adds
 * later are ignored. Only fields the normalizers read are declared; anything
 * the upstream sometimes omits or nulls is `nullish`. Optional player
 * biography leaves with an unexpected type read as null instead of failing
 * the whole list.
 */

export const pageInfoSchema = z.object({
  page: z.number().nullish(),
  numPages: z.number().nullish(),
  pageSize: z.number().nullish(),
  numEntries: z.number().nullish(),
});

export type PageInfo = z.infer<typeof pageInfoSchema>;

// ========== Seasons ==========
export const seasonSchema = z.object({
  id: z.number(),
  label: z.string(),
});

export const seasonListSchema = z.object({
  content: z.array(seasonSchema),
});

export type RawSeason = z.infer<typeof seasonSchema>;

// ========== Clubs ==========
export const teamSchema = z.object({
  id: z.number(),
  name: z.string().nullish(),
  shortName: z.string().nullish(),
  teamType: z.string().nullish(),
  club: z
    .object({
      name: z.string().nullish(),
      abbr: z.string().nullish(),
    })
    .nullish(),
});

export const teamListSchema = z.array(teamSchema);

export type RawTeam = z.infer<typeof teamSchema>;

// ========== Players ==========
const nameBlockSchema = z.object({
  display: z.string(),
  first: z.string().nullish(),
  last: z.string().nullish(),
});

const currentTeamSchema = z.object({
  id: z.number().nullish(),
  name: z.string().nullish(),
  shortName: z.string().nullish(),
});

const nationalTeamSchema = z.object({
  country: z.string().nullish().catch(null),
  isoCode: z.string().nullish().catch(null),
});

export const playerSchema = z.object({
  id: z.number(),
  name: nameBlockSchema,
  info: z
    .object({
      position: z.string().nullish().catch(null),
      shirtNum: z.number().nullish().catch(null),
    })
    .nullish(),
  currentTeam: currentTeamSchema.nullish(),
  nationalTeam: nationalTeamSchema.nullish(),
});

export type RawPlayer = z.infer<typeof playerSchema>;

export const playerPageSchema = z.object({
  content: z.array(z.unknown()),
  pageInfo: pageInfoSchema.nullish(),
});

// ========== Rankings ==========
export const playerOwnerSchema = z.object({
  id: z.number().nullish(),
  name: nameBlockSchema,
  currentTeam: currentTeamSchema.nullish(),
  nationalTeam: nationalTeamSchema.nullish(),
});

export const clubOwnerSchema = z.object({
  id: z.number().nullish(),
  name: z.string(),
  shortName: z.string().nullish(),
});

export const rankingItemSchema = z.object({
  rank: z.number().nullish(),
  value: z.unknown(),
  owner: z.unknown(),
});

export const rankingPageSchema = z.object({
  stats: z.object({
    content: z.array(z.unknown()),
    pageInfo: pageInfoSchema.nullish(),
  }),
});

// ========== Detail blobs (stats/player/{id}, stats/team/{id}) ==========
export const statEntrySchema = z.object({
  name: z.string(),
  value: z.unknown(),
});

export const detailBlobSchema = z.object({
  entity: z.unknown(),
  stats: z.array(z.unknown()).nullish(),
});

export const playerEntitySchema = z.object({
  id: z.number(),
  name: nameBlockSchema,
  info: z
    .object({
      position: z.string().nullish().catch(null),
      shirtNum: z.number().nullish().catch(null),
    })
    .nullish(),
  age: z.string().nullish().catch(null),
  birth: z
    .object({
      date: z.object({ label: z.string().nullish().catch(null) }).nullish().catch(null),
      country: z.object({ country: z.string().nullish().catch(null) }).nullish().catch(null),
    })
    .nullish(),
  height: z.number().nullish().catch(null),
  weight: z.number().nullish().catch(null),
  currentTeam: currentTeamSchema.nullish(),
  nationalTeam: nationalTeamSchema.nullish(),
});

export const clubEntitySchema = z.object({
  id: z.number(),
  name: z.string(),
  shortName: z.string().nullish(),
  club: z
    .object({
      abbr: z.string().nullish(),
    })
    .nullish(),
  grounds: z
    .array(
      z.object({
        name: z.string().nullish(),
        city: z.string().nullish(),
        capacity: z.number().nullish(),
      })
    )
    .nullish(),
});

// ========== Standings ==========
export const tableEntrySchema = z.object({
  position: z.number(),
  team: z.object({
    id: z.number().nullish(),
    name: z.string(),
  }),
  overall: z
    .object({
      played: z.number().nullish(),
      won: z.number().nullish(),
      drawn: z.number().nullish(),
      lost: z.number().nullish(),
      goalsFor: z.number().nullish(),
      goalsAgainst: z.number().nullish(),
      goalsDifference: z.number().nullish(),
      points: z.number().nullish(),
    })
    .nullish(),
});

export const standingsSchema = z.object({
  tables: z.array(
    z.object({
      entries: z.array(z.unknown()),
    })
  ),
});
