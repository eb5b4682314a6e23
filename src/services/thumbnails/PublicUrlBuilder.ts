import path from 'path';
import { ArgumentError } from '../../utils/errors';

export interface UrlBuilder {
  build(filePath: string, fullBase: boolean): string;
}

export interface PublicUrlBuilderOptions {
  targetDir: string;
  publicPath: string;
  fullBaseUrl: string;
}

/**
 * Maps files of the thumbnail directory to the url they are served under.
 */
export class PublicUrlBuilder implements UrlBuilder {
  private readonly targetDir: string;
  private readonly publicPath: string;
  private readonly fullBaseUrl: string;

  constructor(options: PublicUrlBuilderOptions) {
    this.targetDir = path.resolve(options.targetDir);
    this.publicPath = options.publicPath.replace(/\/+$/, '');
    this.fullBaseUrl = options.fullBaseUrl.replace(/\/+$/, '');
  }

  build(filePath: string, fullBase: boolean): string {
    const relative = path.relative(this.targetDir, path.resolve(filePath));
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ArgumentError(`File \`${filePath}\` is not inside the thumbnail directory`);
    }

    const urlPath = `${this.publicPath}/${relative.split(path.sep).map(encodeURIComponent).join('/')}`;
    return fullBase ? `${this.fullBaseUrl}${urlPath}` : urlPath;
  }
}
