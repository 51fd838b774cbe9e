import { ItemApi } from './ItemApi';
import { ImageInfo } from './types';

export class ImageApi extends ItemApi<ImageInfo> {
  protected readonly infoMethod = 'images.info';
  protected readonly hashesMethod = 'images.internal.hashes.list';
  protected readonly uploadMethod = 'images.bulk.upload';
  protected readonly bulkAddMethod = 'images.bulk.add';
  protected readonly downloadMethod = 'images.download-by-hash';
  protected readonly itemsField = 'images';
}
