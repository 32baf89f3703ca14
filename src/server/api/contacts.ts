/**
 * Contacts API
 * Open to anonymous callers
 */

import { Hono } from 'hono';
import { allowAny } from '../../core/auth/index.js';
import { requireAccess } from '../middleware.js';
import { errorResponse, parseId, readJsonBody, type AppEnv } from './utils.js';

export const contactsRouter = new Hono<AppEnv>();

contactsRouter.use('*', requireAccess(allowAny));

contactsRouter.get('/', async (c) => {
  try {
    return c.json(await c.get('service').listContacts());
  } catch (error) {
    return errorResponse(c, error);
  }
});

contactsRouter.post('/', async (c) => {
  try {
    const contact = await c.get('service').createContact(await readJsonBody(c));
    return c.json(contact, 201);
  } catch (error) {
    return errorResponse(c, error);
  }
});

contactsRouter.get('/:id', async (c) => {
  try {
    return c.json(await c.get('service').getContact(parseId(c.req.param('id'))));
  } catch (error) {
    return errorResponse(c, error);
  }
});

contactsRouter.put('/:id', async (c) => {
  try {
    const id = parseId(c.req.param('id'));
    return c.json(await c.get('service').updateContact(id, await readJsonBody(c), false));
  } catch (error) {
    return errorResponse(c, error);
  }
});

contactsRouter.patch('/:id', async (c) => {
  try {
    const id = parseId(c.req.param('id'));
    return c.json(await c.get('service').updateContact(id, await readJsonBody(c), true));
  } catch (error) {
    return errorResponse(c, error);
  }
});

// DELETE /api/contacts/:id - Unassigns the contact from its tasks
contactsRouter.delete('/:id', async (c) => {
  try {
    await c.get('service').deleteContact(parseId(c.req.param('id')));
    return c.body(null, 204);
  } catch (error) {
    return errorResponse(c, error);
  }
});
