import type { FastifyPluginAsync } from 'fastify';

const LANDING_PAGE = `<!doctype html>
<html>
  <head>
    <title>Recursive Witness API</title>
    <style>
      body { font-family: Arial, sans-serif; margin: 40px; }
      .container { max-width: 800px; margin: 0 auto; }
      .header { background-color: #f0f0f0; padding: 20px; border-radius: 5px; }
    </style>
  </head>
  <body>
    <div class="container">
      <div class="header">
        <h1>Recursive Witness API</h1>
      </div>
      <h2>Endpoints</h2>
      <ul>
        <li><b>POST /contemplate</b> - Generate recursive thoughts</li>
        <li><b>GET /status</b> - System status</li>
        <li><b>GET /modes</b> - Available thinking modes</li>
        <li><b>GET /health</b> - LLM runtime reachability</li>
      </ul>
    </div>
  </body>
</html>
`;

export const landingRoutes: FastifyPluginAsync = async (app) => {
  app.get('/', async (_request, reply) => {
    return reply.type('text/html; charset=utf-8').send(LANDING_PAGE);
  });
};
