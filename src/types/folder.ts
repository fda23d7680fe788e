export interface Folder {
  id: string;
  name: string;
  ownerUsername: string;
}

export interface FolderInput {
  name: string;
}
