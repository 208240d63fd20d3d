/**
 * Example: Querying a saved page with every selector mode
 *
 * Usage (after `npm run build`): node dist/examples/local-query.js page.html
 */

import { By, Scraper, createJsonlTracer } from '../src';

async function main() {
  const file = process.argv[2];
  if (!file) {
    console.error('Usage: local-query.ts <file.html>');
    process.exitCode = 1;
    return;
  }

  const tracer = createJsonlTracer('traces/local-query.jsonl');
  const scraper = new Scraper({ tracer });

  try {
    const response = await scraper.getFromLocal(file);
    if (response.status !== 200) {
      console.error(`Could not read ${file}: ${response.status} ${response.statusText}`);
      return;
    }

    const links = scraper.findElements(By.ATTRIBUTE, 'href', undefined, 'a');
    console.log(`Found ${links.length} links`);
    links.slice(0, 5).forEach((link, i) => {
      const href = link.getAttribute('href');
      console.log(`${i + 1}. ${link.getAttribute('innerText')} -> ${href}`);
    });

    // Scoped lookups run against the element's subtree only
    for (const list of scraper.findElements(By.TAG_NAME, 'ul')) {
      const items = list.getChildren('li').map((li) => li.getText());
      console.log(`List with ${items.length} items: ${items.join(', ')}`);
    }

    const content = scraper.findElements(By.CSS_SELECTOR, 'main, article');
    if (content.length > 0) {
      console.log('\nMain content:');
      console.log(content[0].toMarkdown().substring(0, 300));
    }
  } finally {
    await scraper.close();
    await tracer.close();
  }
}

main().catch(console.error);
