import { z } from 'zod';

const requiredText = (field: string) => z.string({ required_error: `${field} is required` });

const textList = (field: string) =>
  z.array(z.string(), {
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a list of strings`,
  });

export const studentProfileRequestSchema = z.object({
  name: requiredText('name'),
  education_level: requiredText('education_level'),
  major: requiredText('major'),
  skills: textList('skills'),
  interests: textList('interests'),
  career_goals: requiredText('career_goals'),
  experience: textList('experience'),
});

export const learningPathRequestSchema = z.object({
  profile: studentProfileRequestSchema,
  target_career: z.string().trim().min(1, 'target_career is required'),
});

export const EDUCATION_LEVELS = ['School (9–12)', 'Diploma', 'Undergraduate', 'Postgraduate'] as const;

export const CAREER_GOALS = ['Job', 'Startup', 'Higher Studies', 'Undecided'] as const;

export const quickAdviceFormSchema = z.object({
  name: z.string().trim().default(''),
  education: z.enum(EDUCATION_LEVELS, {
    errorMap: () => ({ message: 'Choose an education level' }),
  }),
  interests: z.string().trim().default(''),
  skills: z.string().trim().default(''),
  goal: z.enum(CAREER_GOALS, {
    errorMap: () => ({ message: 'Choose a career goal' }),
  }),
});

export type StudentProfileRequest = z.infer<typeof studentProfileRequestSchema>;

export type LearningPathRequest = z.infer<typeof learningPathRequestSchema>;

export type QuickAdviceForm = z.infer<typeof quickAdviceFormSchema>;

export type EducationLevel = (typeof EDUCATION_LEVELS)[number];

export type CareerGoal = (typeof CAREER_GOALS)[number];

export interface StudentProfile {
  name: string;
  educationLevel: string;
  major: string;
  skills: string[];
  interests: string[];
  careerGoals: string;
  experience: string[];
}

export type ValidationIssue = {
  path?: string;
  message: string;
};

export const toValidationIssues = (error: z.ZodError): ValidationIssue[] =>
  error.issues.map((issue) => ({
    path: issue.path.join('.') || undefined,
    message: issue.message,
  }));
