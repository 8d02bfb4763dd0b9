// src/types.ts
export interface Post {
  title: string;
  date: Date;
  categories: string[];
  tags: string[];
  slug: string;
  description?: string;
  draft: boolean;
  body: string;
  /** file the post was read from, when it came off disk */
  source?: string;
}

export type PostWarning = {
  kind: "empty-body";
  source?: string;
  message: string;
};

export interface ParseOptions {
  source?: string;
}

export interface ListOptions {
  dir?: string;
  includeDrafts?: boolean;
  onWarning?: (warning: PostWarning) => void;
}
