import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import fs from 'fs';
import multer from 'multer';
import apiRouter from './api';
import { formatEndpointList } from './api/endpoints';
import { ValidationError } from './runs';
import { config } from './config';

// Ensure data directories exist
const dirs = [config.dataDir, config.uploadsDir, config.outputsDir, config.runsDir];
for (const dir of dirs) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

const app = express();

// Middleware
app.use(cors());
app.use(express.json());

// API routes
app.use('/api', apiRouter);

// Error handling middleware
app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
  console.error('Error:', err.message);

  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message, field: err.field, reason: err.reason });
    return;
  }

  if (err.message.includes('Unsupported file type')) {
    res.status(400).json({ error: err.message });
    return;
  }

  if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
    res.status(413).json({ error: 'File too large' });
    return;
  }

  res.status(500).json({
    error: config.nodeEnv === 'development' ? err.message : 'Internal server error',
  });
});

// 404 handler
app.use((_req: Request, res: Response) => {
  res.status(404).json({ error: 'Not found' });
});

// Start server
const port = config.port;

app.listen(port, () => {
  console.info(`\n🎤 Kara Chart Prep Backend`);
  console.info(`   Server running on http://localhost:${port}`);
  console.info(`   Environment: ${config.nodeEnv}`);
  console.info(`\n   API Endpoints:`);
  for (const line of formatEndpointList()) {
    console.info(line);
  }
  console.info(`\n`);
});

export default app;
