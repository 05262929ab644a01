import { Router, Request, Response } from 'express';
import { signup, login } from '../controllers/authController';

const router = Router();

router.post('/signup', signup);
router.post('/login', login);

// Handle GET requests to auth routes with helpful error message
router.get(['/signup', '/login'], (req: Request, res: Response) => {
  res.status(405).json({
    error: {
      code: 'METHOD_NOT_ALLOWED',
      message: `This endpoint requires POST method. Use POST /api/v1/auth${req.path}`,
    },
  });
});

export default router;
