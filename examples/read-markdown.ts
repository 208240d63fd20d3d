/**
 * Example: Reading page content as Markdown and plain text
 *
 * Fetches a page, prints it as Markdown, then the text of its first heading.
 */

import { By, Scraper, read } from '../src';

async function main() {
  const scraper = new Scraper({ minSleepSeconds: 1, maxSleepSeconds: 2 });

  try {
    await scraper.get('https://example.com');

    console.log('=== Markdown ===');
    const result = read(scraper, { format: 'markdown' });
    console.log(`Markdown length: ${result.length} characters`);
    console.log(result.content.substring(0, 500));

    console.log('\n=== Plain text ===');
    const heading = scraper.findElement(By.TAG_NAME, 'h1');
    console.log(read(scraper, { element: heading }).content);
  } finally {
    await scraper.close();
  }
}

main().catch(console.error);
