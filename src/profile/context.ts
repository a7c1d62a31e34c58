import { StudentProfile, StudentProfileRequest } from './schema';

export const toStudentProfile = (request: StudentProfileRequest): StudentProfile => ({
  name: request.name,
  educationLevel: request.education_level,
  major: request.major,
  skills: request.skills,
  interests: request.interests,
  careerGoals: request.career_goals,
  experience: request.experience,
});

export const buildStudentContext = (profile: StudentProfile): string => `
Student Profile:
- Name: ${profile.name}
- Education: ${profile.educationLevel} in ${profile.major}
- Skills: ${profile.skills.join(', ')}
- Interests: ${profile.interests.join(', ')}
- Career Goals: ${profile.careerGoals}
- Experience: ${profile.experience.join(', ')}
`;
