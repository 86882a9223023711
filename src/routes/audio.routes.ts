import { Router } from 'express';
import * as audioController from '../controllers/audio.controller';
import { validate, schemas } from '../middleware/validate';
import { audioUpload } from '../middleware/upload';

const router = Router();

// Repeat detection on a transcript the client already has
router.post('/repeats', validate(schemas.detectRepeats), audioController.detectRepeats);

// Upload a recording and queue repeat removal
router.post('/dedupe', audioUpload.single('audio'), audioController.dedupeAudio);

export default router;
