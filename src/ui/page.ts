import { CAREER_GOALS, EDUCATION_LEVELS, ValidationIssue } from '../profile/schema';

export type FormValues = {
  name: string;
  education: string;
  interests: string;
  skills: string;
  goal: string;
};

type PageState = {
  values?: Partial<FormValues>;
  errors?: ValidationIssue[];
  advice?: string;
};

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

const renderOptions = (options: readonly string[], selected?: string): string =>
  options
    .map((option) => {
      const attr = option === selected ? ' selected' : '';
      return `<option value="${escapeHtml(option)}"${attr}>${escapeHtml(option)}</option>`;
    })
    .join('');

const renderErrors = (errors: ValidationIssue[]): string => {
  if (!errors.length) {
    return '';
  }

  const items = errors.map((issue) => `<li>${escapeHtml(issue.message)}</li>`).join('');
  return `<ul class="errors">${items}</ul>`;
};

const renderAdvice = (advice?: string): string =>
  advice === undefined ? '' : `<section class="advice"><h2>Your career advice</h2><pre>${escapeHtml(advice)}</pre></section>`;

export const renderAdvicePage = ({ values = {}, errors = [], advice }: PageState = {}): string => `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>AI Career Advisor</title>
<style>
body { font-family: sans-serif; max-width: 720px; margin: 2rem auto; padding: 0 1rem; }
label { display: block; margin-top: 1rem; }
input, select, textarea { width: 100%; padding: 0.4rem; }
.errors { color: #b00020; }
pre { white-space: pre-wrap; }
</style>
</head>
<body>
<h1>AI Career Advisor</h1>
${renderErrors(errors)}
<form method="post" action="/ui/advice">
<label>Your Name <input name="name" value="${escapeHtml(values.name ?? '')}"></label>
<label>Education Level <select name="education">${renderOptions(EDUCATION_LEVELS, values.education)}</select></label>
<label>Your Interests (e.g. AI, Business, Design) <input name="interests" value="${escapeHtml(values.interests ?? '')}"></label>
<label>Your Skills (e.g. Python, Math, Communication) <textarea name="skills">${escapeHtml(values.skills ?? '')}</textarea></label>
<label>Career Goal <select name="goal">${renderOptions(CAREER_GOALS, values.goal)}</select></label>
<button type="submit">Get Career Advice</button>
</form>
${renderAdvice(advice)}
</body>
</html>
`;
