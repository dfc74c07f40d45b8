export type PostMeta = {
  slug: string; // file name without .md
  title: string;
  date?: string; // YYYY-MM-DD, from front matter
  excerpt?: string;
};

export type Post = PostMeta & {
  html: string; // rendered body, without the title line
};
