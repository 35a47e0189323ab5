import { afterEach, describe, it, expect, vi } from 'vitest';

vi.mock('../../src/config/database', async () => {
  const { createFakeDb } = await import('../helpers/fakeDb');
  return { db: createFakeDb(), pool: {} };
});

import { bindForm } from '../../src/forms/form';
import { ratingFormSchema } from '../../src/forms/ratingForm';
import { handleRecipeForm } from '../../src/forms/recipeForm';
import { CategoryService } from '../../src/models/Category';
import { TagService } from '../../src/models/Tag';

const created = new Date('2026-01-01T00:00:00Z');

describe('bindForm', () => {
  const options = { method: 'POST' as const, action: '/recipe/1/rate' };

  it('is not submitted for a GET and shows the initial values', () => {
    const form = bindForm({ method: 'GET', body: { score: 5 } }, ratingFormSchema, options, { score: null });

    expect(form.submitted).toBe(false);
    expect(form.valid).toBe(false);
    expect(form.data).toBeNull();
    expect(form.view).toEqual({ method: 'POST', action: '/recipe/1/rate', values: { score: null }, errors: {} });
  });

  it('coerces and validates a submitted body', () => {
    const form = bindForm({ method: 'POST', body: { score: '4' } }, ratingFormSchema, options);

    expect(form.submitted).toBe(true);
    expect(form.valid).toBe(true);
    expect(form.data).toEqual({ score: 4 });
  });

  it('binds a submitted body alone, ignoring the initial values', () => {
    const form = bindForm({ method: 'POST', body: {} }, ratingFormSchema, options, { score: 3 });

    expect(form.valid).toBe(false);
    expect(form.view.values).toEqual({});
    expect(form.view.errors).toEqual({ score: ['Expected number, received nan'] });
  });

  it('reports field errors and keeps the submitted values', () => {
    const form = bindForm({ method: 'POST', body: { score: '9' } }, ratingFormSchema, options);

    expect(form.valid).toBe(false);
    expect(form.view.values).toEqual({ score: '9' });
    expect(form.view.errors).toEqual({ score: ['Number must be less than or equal to 5'] });
  });
});

describe('handleRecipeForm', () => {
  const options = { method: 'POST' as const, action: '/recipe/create' };

  const stubLookups = () => {
    vi.spyOn(CategoryService, 'findAll').mockResolvedValue([
      { id: 2, title: 'Dinner', createdAt: created, updatedAt: created }
    ]);
    vi.spyOn(TagService, 'findAll').mockResolvedValue([
      { id: 1, title: 'quick', createdAt: created, updatedAt: created },
      { id: 3, title: 'vegan', createdAt: created, updatedAt: created }
    ]);
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('accepts known category and tags, wrapping a single tag id in a list', async () => {
    stubLookups();

    const form = await handleRecipeForm(
      { method: 'POST', body: { title: '  Lentil soup ', content: 'Simmer.', categoryId: '2', tagIds: '3' } },
      options
    );

    expect(form.valid).toBe(true);
    expect(form.data).toEqual({ title: 'Lentil soup', content: 'Simmer.', categoryId: 2, tagIds: [3] });
  });

  it('rejects an unknown category and tag', async () => {
    stubLookups();

    const form = await handleRecipeForm(
      { method: 'POST', body: { title: 'Lentil soup', content: 'Simmer.', categoryId: 7, tagIds: [1, 4] } },
      options
    );

    expect(form.valid).toBe(false);
    expect(form.data).toBeNull();
    expect(form.view.errors).toEqual({ categoryId: ['Unknown category'], tagIds: ['Unknown tag'] });
  });

  it('does not look anything up when the schema already fails', async () => {
    const findCategories = vi.spyOn(CategoryService, 'findAll');

    const form = await handleRecipeForm({ method: 'POST', body: { title: 'ab', content: 'x', categoryId: 2 } }, options);

    expect(form.valid).toBe(false);
    expect(form.view.errors.title).toEqual(['String must contain at least 3 character(s)']);
    expect(findCategories).not.toHaveBeenCalled();
  });

  it('prefills an existing recipe on GET', async () => {
    const form = await handleRecipeForm(
      { method: 'GET', body: {} },
      { method: 'PUT', action: '/recipe/5/edit' },
      { id: 5, title: 'Stew', content: 'Braise.', categoryId: 2, authorId: 1, tagIds: [1] }
    );

    expect(form.submitted).toBe(false);
    expect(form.view.values).toEqual({ title: 'Stew', content: 'Braise.', categoryId: 2, tagIds: [1] });
  });
});
