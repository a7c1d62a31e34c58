import { buildStudentContext, toStudentProfile } from '../../src/profile/context';
import { learningPathRequestSchema, studentProfileRequestSchema } from '../../src/profile/schema';
import { profile, profileContext, profileRequest } from '../helpers/profiles';

describe('toStudentProfile', () => {
    it('should map snake_case request fields onto the profile', () => {
        expect(toStudentProfile(profileRequest)).toEqual(profile);
    });
});

describe('buildStudentContext', () => {
    it('should render the profile block with joined lists', () => {
        expect(buildStudentContext(profile)).toBe(profileContext);
    });

    it('should join multiple experience entries with commas', () => {
        const context = buildStudentContext({ ...profile, experience: ['Lab assistant', 'Science fair'] });

        expect(context).toContain('\n- Experience: Lab assistant, Science fair\n');
    });
});

describe('studentProfileRequestSchema', () => {
    it('should accept empty lists', () => {
        const result = studentProfileRequestSchema.safeParse({ ...profileRequest, skills: [] });

        expect(result.success).toBe(true);
    });

    it('should report a missing list field by name', () => {
        const { interests: _omitted, ...withoutInterests } = profileRequest;
        const result = studentProfileRequestSchema.safeParse(withoutInterests);

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues.map((issue) => issue.message)).toEqual(['interests is required']);
        }
    });

    it('should reject a list field given as plain text', () => {
        const result = studentProfileRequestSchema.safeParse({ ...profileRequest, skills: 'Python' });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0]?.message).toBe('skills must be a list of strings');
        }
    });
});

describe('learningPathRequestSchema', () => {
    it('should trim the target career', () => {
        const result = learningPathRequestSchema.parse({ profile: profileRequest, target_career: '  Data Scientist ' });

        expect(result.target_career).toBe('Data Scientist');
    });

    it('should reject a blank target career', () => {
        const result = learningPathRequestSchema.safeParse({ profile: profileRequest, target_career: '   ' });

        expect(result.success).toBe(false);
        if (!result.success) {
            expect(result.error.issues[0]?.message).toBe('target_career is required');
        }
    });
});
