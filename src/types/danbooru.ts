export interface Post {
  id: number;
  md5?: string; // hidden unless the viewer may see the file
  file_ext: string;
  file_url?: string; // missing for deleted or restricted posts
}

export interface DownloadablePost extends Post {
  file_url: string;
}

export interface Pool {
  id: number;
  name?: string;
  postIds: number[];
}
