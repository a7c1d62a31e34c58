import { createAdvisor } from './advisorFactory';
import { createApp } from './app';
import { loadConfig } from './config';

const config = loadConfig();
const advisor = createAdvisor(config.llm);

if (!advisor) {
  console.warn('Warning: OPENAI_API_KEY not found. The advisor endpoints will answer 500 until it is set.');
}

const app = createApp({ advisor, corsOrigin: config.corsOrigin });

app.listen(config.port, () => {
  console.log(`Server listening on port ${config.port} (model ${config.llm.model})`);
});

export default app;
