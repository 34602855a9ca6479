import * as fs from 'fs';
import * as path from 'path';
import { BitcoinNetworkName, generateKeyPair } from '../crypto';

function generateControllerKeys() {
  console.log('=== Issuance Node Key Generator ===\n');

  const network: BitcoinNetworkName = process.env.BITCOIN_NETWORK === 'mainnet' ? 'mainnet' : 'testnet';
  const { privateKey, publicKey, address } = generateKeyPair(network);

  console.log('Generated controller credentials:\n');
  console.log('CONTROLLER_PUBLIC_KEY=' + publicKey);
  console.log('CONTROLLER_PRIVATE_KEY=' + privateKey);
  console.log('Controller identity: ' + address);
  console.log('\nIMPORTANT: Keep the private key offline. The node only needs the public key.\n');

  const envPath = path.join(process.cwd(), '.env');
  if (fs.existsSync(envPath)) {
    console.log('Found existing .env file. Please manually update it with the public key above.\n');
    return;
  }

  console.log('Creating .env file...\n');
  const envContent = `# Controller identity (generated ${new Date().toISOString()})
CONTROLLER_PUBLIC_KEY=${publicKey}
BITCOIN_NETWORK=${network}

# API
PORT=3000
REQUEST_MAX_AGE_MS=300000

# Data storage
DATA_DIR=./data

# Block clock
BLOCK_TIME_MS=10000

# Issuance parameters (fixed for the life of the data directory)
MAX_ISSUERS=10
ISSUER_TERM_LENGTH=100000
BASE_MINT_FACTOR=1000
SUPPLY_FLOOR=1000000
EARLY_EXIT_THRESHOLD_BPS=9500
LOW_MINT_THRESHOLD=200
BURN_BONUS_STEP=100
`;
  fs.writeFileSync(envPath, envContent);
  console.log('Created .env file');
  console.log('Next step: npm start\n');
}

generateControllerKeys();
