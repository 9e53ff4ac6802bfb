import { z } from 'zod'
import { EducationLevel } from '../types'

const keywordList = z.array(z.string().min(1))

const contextPatternSchema = z.union([
  z.string().min(1),
  z.object({
    source: z.string().min(1),
    requiredContext: keywordList.optional(),
    forbiddenContext: keywordList.optional(),
  }),
])

export const patternRuleSchema = z.object({
  patterns: z.array(contextPatternSchema).min(1),
  requiredContext: keywordList.optional(),
  forbiddenContext: keywordList.optional(),
  contextWindow: z.number().int().nonnegative().optional(),
  caseSensitive: z.boolean().optional(),
})

export const registrySchema = z
  .object({
    version: z.string(),
    skills: z
      .array(
        z.object({
          name: z.string().min(1),
          aliases: z.array(z.string().min(1)).optional(),
          caseSensitive: z.boolean().optional(),
        })
      )
      .min(1),
    certifications: z.array(patternRuleSchema.extend({ name: z.string().min(1) })),
    certificationContextWindow: z.number().int().nonnegative(),
    educationLevels: z.array(
      z.object({
        level: z.nativeEnum(EducationLevel),
        rules: z.array(patternRuleSchema).min(1),
      })
    ),
    workContext: keywordList.min(1),
    educationContext: keywordList.min(1),
    dateRanges: z
      .array(
        z.object({
          kind: z.enum(['month-name', 'numeric', 'year']),
          pattern: z.string().min(1),
        })
      )
      .min(1),
    nameBlocklist: keywordList,
    filenameNoise: keywordList,
    location: z.object({
      techTerms: keywordList,
      techContextPhrases: keywordList,
    }),
    companies: z.object({
      suffixes: keywordList.min(1),
      exclusions: keywordList,
      institutionKeywords: keywordList,
    }),
    jobTitles: z.object({
      seniority: keywordList,
      domains: keywordList,
      roles: keywordList.min(1),
      exclusions: keywordList,
      contextKeywords: keywordList,
    }),
  })
  .superRefine((data, ctx) => {
    const work = new Set(data.workContext.map((k) => k.toLowerCase()))
    for (const keyword of data.educationContext) {
      if (work.has(keyword.toLowerCase())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['educationContext'],
          message: `"${keyword}" appears in both workContext and educationContext`,
        })
      }
    }

    const levels = data.educationLevels.map((entry) => entry.level)
    if (levels.includes(EducationLevel.NotSpecified)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['educationLevels'],
        message: `"${EducationLevel.NotSpecified}" cannot have keywords`,
      })
    }
    if (new Set(levels).size !== levels.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['educationLevels'],
        message: 'each education level may appear only once',
      })
    }
  })

export type RegistryData = z.infer<typeof registrySchema>
export type PatternRuleData = z.infer<typeof patternRuleSchema>
