import { Request } from 'express';
import { z } from 'zod';
import { TagData } from '../../data/tag/types';
import { parseBody } from '../../utils/net/request';
import { LedgerStore } from '../../utils/store/types';

export const CreateTagSchema = z.object({
  name: z.string().trim().min(1, 'Tag name is required').max(100, 'Tag name must be 100 characters or less'),
});

export async function getTags(_request: Request, store: LedgerStore): Promise<TagData[]> {
  return store.listTags();
}

export async function addTag(request: Request, store: LedgerStore): Promise<TagData> {
  const { name } = parseBody(CreateTagSchema, request.body);
  return store.createTag(name);
}
