/**
 * Post formatting exports
 */
export {
  renderPostText,
  findAnchorPost,
  findPublishedPost,
  getPostUrl,
  describePost,
  type RenderOptions,
  type AnchorSearch,
} from './post-formatter';
