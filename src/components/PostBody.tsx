import type { Post } from '@/types/post';

// `html` comes out of the sanitizing Markdown pipeline in lib/markdown.
export default function PostBody({ post }: { post: Post }) {
  return <div className="prose max-w-none" dangerouslySetInnerHTML={{ __html: post.html }} />;
}
