import { Router, Request, Response } from 'express';
import {
  listRecipes,
  showRecipe,
  createRecipe,
  editRecipe,
  deleteRecipe,
  rateRecipe,
  getTopRatedRecipes
} from '../controllers/recipeController';
import { requireRecipeAccess, resolveRecipe } from '../middleware/auth';

const router = Router();

// Recipe ids are positive integers without a leading zero
const ID = ':id([1-9]\\d*)';

// GET recipe listing (recipe_index)
router.get('/', async (req: Request, res: Response) => {
  await listRecipes(req, res);
});

// GET top rated recipes (recipe_top-rated)
router.get('/top-rated', async (req: Request, res: Response) => {
  await getTopRatedRecipes(req, res);
});

// GET form / POST new recipe (recipe_create)
router.route('/create')
  .get(async (req: Request, res: Response) => {
    await createRecipe(req, res);
  })
  .post(async (req: Request, res: Response) => {
    await createRecipe(req, res);
  });

// GET recipe details (recipe_show)
router.get(`/${ID}`, requireRecipeAccess, (req: Request, res: Response) => {
  showRecipe(req, res);
});

// GET form / PUT changes (recipe_edit)
router.route(`/${ID}/edit`)
  .all(requireRecipeAccess)
  .get(async (req: Request, res: Response) => {
    await editRecipe(req, res);
  })
  .put(async (req: Request, res: Response) => {
    await editRecipe(req, res);
  });

// GET confirmation / DELETE recipe (recipe_delete)
router.route(`/${ID}/delete`)
  .all(requireRecipeAccess)
  .get(async (req: Request, res: Response) => {
    await deleteRecipe(req, res);
  })
  .delete(async (req: Request, res: Response) => {
    await deleteRecipe(req, res);
  });

// GET form / POST rating (recipe_rate)
router.route(`/${ID}/rate`)
  .all(resolveRecipe)
  .get(async (req: Request, res: Response) => {
    await rateRecipe(req, res);
  })
  .post(async (req: Request, res: Response) => {
    await rateRecipe(req, res);
  });

export default router;
