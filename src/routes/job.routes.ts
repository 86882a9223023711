import { Router } from 'express';
import * as jobController from '../controllers/job.controller';

const router = Router();

router.get('/:queue/:id', jobController.getJobStatus);

export default router;
