import fs from 'node:fs';
import path from 'node:path';
import type { Image, Root } from 'mdast';
import type { Plugin } from 'unified';
import { visit } from 'unist-util-visit';
import { imageSize } from 'image-size';

export interface ImageSizeOptions {
  /** Directory that site-relative image URLs resolve against. */
  publicDir: string;
}

// Remark plugin: give local images (![alt](/img/a.png)) their intrinsic width/height
// so the browser can reserve space before they load.
// Remote URLs: left as-is (can't measure without fetching).
const remarkImageSize: Plugin<[ImageSizeOptions], Root> = ({ publicDir }) => (tree) => {
  const root = path.resolve(publicDir);
  visit(tree, 'image', (node: Image) => {
    if (/^[a-z][a-z0-9+.-]*:/i.test(node.url) || node.url.startsWith('//')) return;
    const [pathname = ''] = node.url.split(/[?#]/);
    const imgPath = path.resolve(root, pathname.replace(/^\/+/, ''));
    if (!imgPath.startsWith(root + path.sep) || !fs.existsSync(imgPath)) return;
    let size: { width?: number; height?: number };
    try {
      size = imageSize(imgPath);
    } catch {
      return; // unknown format, leave unsized
    }
    if (!size.width || !size.height) return;
    node.data = {
      ...node.data,
      hProperties: { ...node.data?.hProperties, width: size.width, height: size.height },
    };
  });
};

export default remarkImageSize;
