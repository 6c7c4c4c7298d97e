import type { Post } from '../types/post.js';

/** Sample posts a freshly served instance starts with. */
export const SEED_POSTS: readonly Post[] = [
  {
    id: 1,
    title: 'First post',
    content: 'This is the first post.',
    author: 'Author One',
    date: '2023-01-01',
  },
  {
    id: 2,
    title: 'Second post',
    content: 'This is the second post.',
    author: 'Author Two',
    date: '2023-02-01',
  },
];
