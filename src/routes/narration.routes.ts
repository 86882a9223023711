import { Router } from 'express';
import * as narrationController from '../controllers/narration.controller';
import { validate, schemas } from '../middleware/validate';

const router = Router();

// Prompt keys accepted by POST /
router.get('/prompts', narrationController.getPrompts);

// Synchronous chunk preview
router.post('/chunks', validate(schemas.previewChunks), narrationController.previewChunks);

// Queue a full narration
router.post('/', validate(schemas.createNarration), narrationController.createNarration);

export default router;
