import os from 'os';
import path from 'path';
import { DownloaderConfig } from '../types';

const DOWNLOADS_DIR = path.join(os.homedir(), 'Downloads');

export const REQUEST_TIMEOUT_MS = 30000;

export const defaultConfig: DownloaderConfig = {
  outputDir: path.join(DOWNLOADS_DIR, 'textbook_download'),
  exportPath: path.join(DOWNLOADS_DIR, 'textbook_info.csv'),
  logLevel: 'info',
  headers: {
    'User-Agent':
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/58.0.3029.110 Safari/537.36',
    Referer: 'https://basic.smartedu.cn/',
    Origin: 'https://basic.smartedu.cn',
    Accept: 'application/json, text/plain, */*',
    'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
  },
  catalog: {
    versionUrl:
      'https://s-file-1.ykt.cbern.com.cn/zxx/ndrs/resources/tch_material/version/data_version.json',
    catalogUrls: [],
    requestTimeout: REQUEST_TIMEOUT_MS,
  },
  resolver: {
    detailsBaseUrl: 'https://s-file-1.ykt.cbern.com.cn/zxx/ndrv2/resources/tch_material/details',
    requestTimeout: REQUEST_TIMEOUT_MS,
  },
  transfer: {
    mirrors: [
      { name: 'r1-ndr-oversea', baseUrl: 'https://r1-ndr-oversea.ykt.cbern.com.cn' },
      { name: 'r2-ndr-oversea', baseUrl: 'https://r2-ndr-oversea.ykt.cbern.com.cn' },
      { name: 'r3-ndr-oversea', baseUrl: 'https://r3-ndr-oversea.ykt.cbern.com.cn' },
    ],
    requestTimeout: REQUEST_TIMEOUT_MS,
    minDocumentBytes: 1000000, // error pages and placeholders are far smaller
    skipExisting: false,
    delayBetweenRecords: 1000,
  },
};

export const ENV_KEYS = {
  OUTPUT_DIR: 'TEXTBOOK_OUTPUT_DIR',
  EXPORT_PATH: 'TEXTBOOK_EXPORT_PATH',
  LOG_LEVEL: 'TEXTBOOK_LOG_LEVEL',
  MIN_DOCUMENT_BYTES: 'TEXTBOOK_MIN_DOCUMENT_BYTES',
} as const;
