import { Router } from 'express';
import narrationRoutes from './narration.routes';
import audioRoutes from './audio.routes';
import voiceRoutes from './voice.routes';
import jobRoutes from './job.routes';

const router = Router();

// Mount routes
router.use('/narration', narrationRoutes);
router.use('/audio', audioRoutes);
router.use('/voices', voiceRoutes);
router.use('/jobs', jobRoutes);

// Health check for API
router.get('/health', (req, res) => {
  res.json({
    success: true,
    message: 'API is running',
    timestamp: new Date().toISOString(),
  });
});

export default router;
