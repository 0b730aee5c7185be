import os from 'os';
import path from 'path';

function defaultNodeName(): string {
  try {
    return os.hostname() || 'Unnamed node';
  } catch {
    return 'Unnamed node';
  }
}

const publicDir = path.resolve(__dirname, '../../public');

export const defaultConfig = {
  node: {
    name: defaultNodeName(),
  },
  admin: {
    address: 'unix:///var/run/yggdrasil.sock',
    timeout: 5000,
    maxResponseBytes: 4 * 1024 * 1024,
  },
  server: {
    listenAddress: '[::]:80',
  },
  web: {
    publicDir,
    templatePath: path.join(publicDir, 'template.html'),
  },
  logging: {
    level: 'info',
    file: '',
  },
};
