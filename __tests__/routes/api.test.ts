import request from 'supertest';

import { createApp } from '../../src/app';
import { LlmConfigurationError } from '../../src/errors';
import { createAdvisorStub } from '../helpers/advisorStub';
import { profile, profileRequest } from '../helpers/profiles';

describe('advisor API routes', () => {
    let advisor: ReturnType<typeof createAdvisorStub>;
    let infoSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        advisor = createAdvisorStub();
        infoSpy = jest.spyOn(console, 'info').mockImplementation(() => {});
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        infoSpy.mockRestore();
        errorSpy.mockRestore();
    });

    describe('GET /', () => {
        it('should describe the service and its endpoints', async () => {
            const res = await request(createApp({ advisor })).get('/');

            expect(res.statusCode).toEqual(200);
            expect(res.body.message).toEqual('Student Career Advisor API');
            expect(res.body.version).toEqual('1.0.0');
            expect(res.body.endpoints.skills_analysis).toEqual('/analyze/skills');
            expect(res.body.endpoints.industry_research).toEqual('/research/industry/{industry_name}');
            expect(res.body).not.toHaveProperty('docs');
        });
    });

    describe('GET /health', () => {
        it('should report an initialised advisor', async () => {
            const res = await request(createApp({ advisor })).get('/health');

            expect(res.body).toEqual({ status: 'healthy', advisor_initialized: true });
        });

        it('should report a missing advisor', async () => {
            const res = await request(createApp({ advisor: null })).get('/health');

            expect(res.statusCode).toEqual(200);
            expect(res.body).toEqual({ status: 'healthy', advisor_initialized: false });
        });
    });

    describe('POST /analyze/skills', () => {
        it('should return the skills analysis', async () => {
            advisor.analyzeSkills.mockResolvedValueOnce('Learn Python next.');

            const res = await request(createApp({ advisor })).post('/analyze/skills').send(profileRequest);

            expect(res.statusCode).toEqual(200);
            expect(res.body).toEqual({ analysis: 'Learn Python next.' });
            expect(advisor.analyzeSkills).toHaveBeenCalledWith(profile);
        });

        it('should return 400 when a field is missing', async () => {
            const { skills: _omitted, ...body } = profileRequest;

            const res = await request(createApp({ advisor })).post('/analyze/skills').send(body);

            expect(res.statusCode).toEqual(400);
            expect(res.body).toEqual({ errors: [{ path: 'skills', message: 'skills is required' }] });
            expect(advisor.analyzeSkills).not.toHaveBeenCalled();
        });

        it('should return 400 for malformed JSON', async () => {
            const res = await request(createApp({ advisor }))
                .post('/analyze/skills')
                .set('Content-Type', 'application/json')
                .send('{"name": ');

            expect(res.statusCode).toEqual(400);
            expect(res.body.errors).toHaveLength(1);
        });

        it('should return 500 when no advisor is configured', async () => {
            const res = await request(createApp({ advisor: null })).post('/analyze/skills').send(profileRequest);

            expect(res.statusCode).toEqual(500);
            expect(res.body).toEqual({ detail: 'Advisor not initialized' });
        });

        it('should return 500 with the failure message when the model call fails', async () => {
            advisor.analyzeSkills.mockRejectedValueOnce(new Error('upstream timeout'));

            const res = await request(createApp({ advisor })).post('/analyze/skills').send(profileRequest);

            expect(res.statusCode).toEqual(500);
            expect(res.body).toEqual({ detail: 'upstream timeout' });
        });

        it('should surface provider configuration errors', async () => {
            advisor.analyzeSkills.mockRejectedValueOnce(new LlmConfigurationError('LLM API key not configured.'));

            const res = await request(createApp({ advisor })).post('/analyze/skills').send(profileRequest);

            expect(res.statusCode).toEqual(500);
            expect(res.body).toEqual({ detail: 'LLM API key not configured.' });
        });
    });

    describe('POST /match/careers', () => {
        it('should return the career matches', async () => {
            advisor.findCareerMatches.mockResolvedValueOnce('1. Geneticist');

            const res = await request(createApp({ advisor })).post('/match/careers').send(profileRequest);

            expect(res.statusCode).toEqual(200);
            expect(res.body).toEqual({ matches: '1. Geneticist' });
            expect(advisor.findCareerMatches).toHaveBeenCalledWith(profile);
        });
    });

    describe('POST /create/learning-path', () => {
        it('should return the learning path for the target career', async () => {
            advisor.createLearningPath.mockResolvedValueOnce('Month 1: statistics');

            const res = await request(createApp({ advisor }))
                .post('/create/learning-path')
                .send({ profile: profileRequest, target_career: 'Data Scientist' });

            expect(res.statusCode).toEqual(200);
            expect(res.body).toEqual({ learning_path: 'Month 1: statistics' });
            expect(advisor.createLearningPath).toHaveBeenCalledWith(profile, 'Data Scientist');
        });

        it('should validate the nested profile', async () => {
            const res = await request(createApp({ advisor }))
                .post('/create/learning-path')
                .send({ profile: { ...profileRequest, major: 42 }, target_career: 'Data Scientist' });

            expect(res.statusCode).toEqual(400);
            expect(res.body.errors[0].path).toEqual('profile.major');
        });
    });

    describe('GET /research/industry/:industryName', () => {
        it('should research the decoded industry name', async () => {
            advisor.researchIndustry.mockResolvedValueOnce('Solar is growing.');

            const res = await request(createApp({ advisor })).get('/research/industry/Renewable%20Energy');

            expect(res.statusCode).toEqual(200);
            expect(res.body).toEqual({ research: 'Solar is growing.' });
            expect(advisor.researchIndustry).toHaveBeenCalledWith('Renewable Energy');
        });

        it('should pass the industry name through as received', async () => {
            advisor.researchIndustry.mockResolvedValueOnce('Wind is growing.');

            await request(createApp({ advisor })).get('/research/industry/%20Offshore%20Wind%20');

            expect(advisor.researchIndustry).toHaveBeenCalledWith(' Offshore Wind ');
        });

        it('should reject a blank industry name', async () => {
            const res = await request(createApp({ advisor })).get('/research/industry/%20');

            expect(res.statusCode).toEqual(400);
            expect(advisor.researchIndustry).not.toHaveBeenCalled();
        });
    });

    describe('POST /advice/comprehensive', () => {
        it('should return all three sections in snake_case', async () => {
            advisor.getComprehensiveAdvice.mockResolvedValueOnce({
                skillsAnalysis: 'skills',
                careerMatches: 'matches',
                actionPlan: 'plan',
            });

            const res = await request(createApp({ advisor })).post('/advice/comprehensive').send(profileRequest);

            expect(res.statusCode).toEqual(200);
            expect(res.body).toEqual({ skills_analysis: 'skills', career_matches: 'matches', action_plan: 'plan' });
        });
    });

    describe('HTTP plumbing', () => {
        it('should answer 404 for unknown routes', async () => {
            const res = await request(createApp({ advisor })).get('/nope');

            expect(res.statusCode).toEqual(404);
            expect(res.body).toEqual({ detail: 'Route GET /nope not found' });
        });

        it('should echo a caller supplied request id', async () => {
            const res = await request(createApp({ advisor })).get('/health').set('X-Request-Id', 'req-123');

            expect(res.headers['x-request-id']).toEqual('req-123');
        });

        it('should generate a request id when none is sent', async () => {
            const res = await request(createApp({ advisor })).get('/health');

            expect(res.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
        });

        it('should allow any origin by default', async () => {
            const res = await request(createApp({ advisor })).get('/health').set('Origin', 'http://frontend.test');

            expect(res.headers['access-control-allow-origin']).toEqual('http://frontend.test');
            expect(res.headers['access-control-allow-credentials']).toEqual('true');
        });

        it('should restrict origins when configured', async () => {
            const res = await request(createApp({ advisor, corsOrigin: 'http://allowed.test' }))
                .get('/health')
                .set('Origin', 'http://other.test');

            expect(res.headers['access-control-allow-origin']).toBeUndefined();
        });
    });
});
