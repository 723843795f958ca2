/**
 * Converter configuration
 */
import dotenv from 'dotenv';

dotenv.config();

export const config = {
  cardsXmlPath: process.env.CARDS_XML_PATH || '',
  outputDir: process.env.FORGE_OUTPUT_DIR || './forge_cards',
};
