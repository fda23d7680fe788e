import { Hono } from "hono";
import { requireAuth, type AccessGuardContext } from "@/middleware/auth";
import { folderSchema } from "@/lib/schemas";
import { createFolder, listFolders } from "@/services/folderService";
import type { FolderResponse } from "@/types/api";
import type { AppEnv } from "@/types/app";
import type { Folder } from "@/types/folder";
import { parseJsonBody } from "@/utils/body";

export function toFolderResponse(folder: Folder): FolderResponse {
  return {
    id: folder.id,
    name: folder.name,
    owner_username: folder.ownerUsername,
  };
}

export function createFoldersRoute(ctx: AccessGuardContext) {
  const route = new Hono<AppEnv>();
  const auth = requireAuth(ctx);

  route.post("/", auth, async (c) => {
    const body = await parseJsonBody(c, folderSchema);
    const folder = await createFolder(ctx.db, c.get("account"), body);
    return c.json(toFolderResponse(folder), 201);
  });

  route.get("/", auth, async (c) => {
    const folders = await listFolders(ctx.db, c.get("account"));
    return c.json(folders.map(toFolderResponse));
  });

  return route;
}
