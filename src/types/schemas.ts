import { z } from 'zod'
import { EducationLevel } from './index'

export const documentInputSchema = z.object({
  text: z.string({
    required_error: 'text is required',
    invalid_type_error: 'text must be a string',
  }),
  sourceFilename: z.string({ invalid_type_error: 'sourceFilename must be a string' }).default(''),
})

export type DocumentInput = z.infer<typeof documentInputSchema>

export const candidateRecordSchema = z.object({
  name: z.string(),
  email: z.string(),
  phone: z.string(),
  location: z.string(),
  skills: z.array(z.string()),
  companies: z.array(z.string()),
  jobTitles: z.array(z.string()),
  educationLevel: z.nativeEnum(EducationLevel),
  certifications: z.array(z.string()),
  yearsExperience: z.number().min(0).max(50),
  sourceId: z.string(),
})
