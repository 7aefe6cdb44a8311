import { describe, expect, it, vi } from 'vitest'
import type { PageLoad } from '../../collector/types.js'
import { BlockedBySourceError, TransientFetchError } from '../../collector/errors.js'
import { createTestLogger, FakePage, listingUrl, SEARCH_URL } from '../../collector/__tests__/fakes.js'
import { extractListing, HtmlListingExtractor, loadHtml, parseCount } from '../html-extractor.js'

const DETAIL_PAGE = `<html><head>
<meta property="og:title" content="Ignored when JSON-LD has a name">
<script type="application/ld+json">
{"@context":"https://schema.org","@graph":[
  {"@type":"BreadcrumbList"},
  {"@type":["Product","Apartment"],
   "name":"Apartamento 72 m²",
   "description":"Sala ampla",
   "numberOfRooms":3,
   "numberOfBathroomsTotal":"2 banheiros",
   "floorSize":{"value":72,"unitText":"m²"},
   "address":{"streetAddress":"Rua das Flores, 10","addressLocality":"São Paulo","addressRegion":"SP"},
   "offers":[{"price":650000}],
   "image":["https://img.example.com/a.jpg",{"url":"https://img.example.com/b.jpg"}]}
]}
</script>
</head><body>
<span itemprop="numberOfParkingSpaces">1 vaga</span>
<div data-testid="carousel-photos">
  <img src="https://img.example.com/a.jpg"><img data-src="https://img.example.com/c.jpg"><img src="/relative.jpg">
</div>
<div data-testid="description-content">  Sala   ampla com varanda </div>
<div data-testid="advertiser-info-header">Imobiliária Sol</div>
<div data-testid="advertiser-code">CRECI 12345-J</div>
<p data-testid="listing-code">Código do anúncio: 2598765432</p>
<span data-testid="phone-number">(11) 9876-XXXX</span>
<a href="https://wa.me/5511">WhatsApp</a>
<span data-testid="iptu-value">R$ 1.200</span>
<span data-testid="condo-fee-value">R$ 800</span>
<span itemprop="numberOfSuites">1 suíte</span>
<span itemprop="floorLevel">7º andar</span>
<ul data-testid="amenities-list"><li>Piscina</li><li> </li><li>Academia</li></ul>
</body></html>`

const OPEN_GRAPH_PAGE = `<html><head>
<meta property="og:title" content="Casa com quintal">
<meta property="og:description" content="Casa térrea">
<meta property="og:image" content="https://img.example.com/og.jpg">
</head><body>
<h1>Heading</h1>
<span data-testid="price-value">R$ 450.000</span>
<span data-testid="address-info">Campinas, SP</span>
<span itemprop="floorSize">120 m²</span>
<span itemprop="numberOfRooms">2 quartos</span>
</body></html>`

const RESULTS_PAGE_1 = `<html><body>
<a href="/imovel/venda-apartamento-id-1/?source=card" title="Apto 1">
  <span data-cy="rp-cardProperty-price-txt">R$ 500.000</span>
  <span data-cy="rp-cardProperty-bedroomQuantity-txt">2 quartos</span>
</a>
<a href="https://www.zapimoveis.com.br/imovel/venda-apartamento-id-2/">
  <h2> Apto  2 </h2>
  <span data-cy="rp-cardProperty-location-txt">Moema, São Paulo</span>
</a>
<a href="/imovel/venda-apartamento-id-1/">duplicate</a>
<a href="/venda/apartamentos/">search link</a>
</body></html>`

const RESULTS_PAGE_2 = `<html><body>
<a href="/imovel/venda-apartamento-id-3/" title="Apto 3"></a>
</body></html>`

const PAGE_2_URL = `${SEARCH_URL}?pagina=2`
const PAGE_3_URL = `${SEARCH_URL}?pagina=3`

function ok(html: string): PageLoad {
  return { status: 'ok', statusCode: 200, html, durationMs: 1 }
}

function extractor(options: { pageDelayMs?: number; sleep?: (ms: number) => Promise<void> } = {}) {
  return new HtmlListingExtractor({ ...options, logger: createTestLogger() })
}

describe('extractListing', () => {
  it('prefers JSON-LD and reads deep fields from the page', () => {
    const url = listingUrl(7)

    expect(extractListing(loadHtml(DETAIL_PAGE), url, true)).toEqual({
      url,
      title: 'Apartamento 72 m²',
      price: '650000',
      location: 'São Paulo, SP',
      area: '72 m²',
      bedrooms: 3,
      bathrooms: 2,
      parking_spaces: 1,
      description: 'Sala ampla',
      images: ['https://img.example.com/a.jpg', 'https://img.example.com/b.jpg', 'https://img.example.com/c.jpg'],
      full_address: 'Rua das Flores, 10, São Paulo, SP',
      full_description: 'Sala ampla com varanda',
      advertiser_name: 'Imobiliária Sol',
      advertiser_code: 'CRECI 12345-J',
      zap_code: '2598765432',
      phone_partial: '(11) 9876-XXXX',
      has_whatsapp: true,
      iptu: 'R$ 1.200',
      condo_fee: 'R$ 800',
      suites: 1,
      floor_level: 7,
      amenities: ['Piscina', 'Academia'],
    })
  })

  it('falls back to Open Graph and selectors without JSON-LD', () => {
    const url = listingUrl(8)

    expect(extractListing(loadHtml(OPEN_GRAPH_PAGE), url, false)).toEqual({
      url,
      title: 'Casa com quintal',
      price: 'R$ 450.000',
      location: 'Campinas, SP',
      area: '120 m²',
      bedrooms: 2,
      description: 'Casa térrea',
      images: ['https://img.example.com/og.jpg'],
    })
  })

  it('takes the listing code from the url when the page has none', () => {
    const url = listingUrl(42)

    expect(extractListing(loadHtml('<h1>Apto</h1>'), url, true)).toEqual({ url, title: 'Apto', zap_code: '42' })
  })

  it('skips JSON-LD blocks that are not valid JSON', () => {
    const html = `<script type="application/ld+json">{not json</script>
<script type="application/ld+json">{"@type":"House","name":"Sobrado"}</script>`

    expect(extractListing(loadHtml(html), listingUrl(9), false).title).toBe('Sobrado')
  })
})

describe('parseCount', () => {
  it('reads the first integer of a label', () => {
    expect(parseCount('3 quartos')).toBe(3)
    expect(parseCount('sem vagas')).toBeUndefined()
    expect(parseCount(undefined)).toBeUndefined()
  })
})

describe('HtmlListingExtractor.scrapeListing', () => {
  it('returns an error record when the page does not load', async () => {
    const page = new FakePage(() => ({ status: 'blocked', statusCode: 403, durationMs: 1, error: 'HTTP 403: Forbidden' }))

    const result = await extractor().scrapeListing(page, listingUrl(1), true)

    expect(result).toEqual({ url: listingUrl(1), error: 'HTTP 403: Forbidden' })
  })

  it('describes loads that carry no error text', async () => {
    const page = new FakePage(() => ({ status: 'timeout', durationMs: 1 }))

    const result = await extractor().scrapeListing(page, listingUrl(1), true)

    expect(result).toEqual({ url: listingUrl(1), error: 'Page load timeout' })
  })
})

describe('HtmlListingExtractor.scrapeSearchResults', () => {
  const pages: Record<string, string> = {
    [SEARCH_URL]: RESULTS_PAGE_1,
    [PAGE_2_URL]: RESULTS_PAGE_2,
    [PAGE_3_URL]: '<html><body></body></html>',
  }

  it('collects cards page by page until an empty page', async () => {
    const page = new FakePage(url => ok(pages[url] ?? ''))
    const onPage = vi.fn(async () => undefined)
    const sleep = vi.fn(async (_ms: number) => undefined)

    const listings = await extractor({ pageDelayMs: 250, sleep }).scrapeSearchResults(page, SEARCH_URL, 5, onPage)

    const first = { url: listingUrl(1), title: 'Apto 1', price: 'R$ 500.000', bedrooms: 2 }
    const second = { url: listingUrl(2), title: 'Apto 2', location: 'Moema, São Paulo' }
    const third = { url: listingUrl(3), title: 'Apto 3' }
    expect(listings).toEqual([first, second, third])
    expect(page.loaded).toEqual([SEARCH_URL, PAGE_2_URL, PAGE_3_URL])
    expect(onPage.mock.calls).toEqual([
      [1, [first, second], SEARCH_URL],
      [2, [third], SEARCH_URL],
    ])
    expect(sleep.mock.calls).toEqual([[250], [250]])
  })

  it('stops at the page ceiling', async () => {
    const page = new FakePage(url => ok(pages[url] ?? ''))

    const listings = await extractor().scrapeSearchResults(page, SEARCH_URL, 1)

    expect(listings).toHaveLength(2)
    expect(page.loaded).toEqual([SEARCH_URL])
  })

  it('throws a blocked error when the first page is blocked', async () => {
    const page = new FakePage(() => ({ status: 'blocked', statusCode: 429, durationMs: 1, error: 'HTTP 429: Too Many Requests' }))

    await expect(extractor().scrapeSearchResults(page, SEARCH_URL, 5)).rejects.toBeInstanceOf(BlockedBySourceError)
  })

  it('throws a transient error when the first page fails otherwise', async () => {
    const page = new FakePage(() => ({ status: 'error', statusCode: 500, durationMs: 1, error: 'HTTP 500: Internal Server Error' }))

    await expect(extractor().scrapeSearchResults(page, SEARCH_URL, 5)).rejects.toThrow(
      new TransientFetchError('HTTP 500: Internal Server Error', SEARCH_URL)
    )
  })

  it('keeps earlier pages when a later page fails', async () => {
    const page = new FakePage(url =>
      url === SEARCH_URL ? ok(RESULTS_PAGE_1) : { status: 'error', durationMs: 1, error: 'HTTP 502: Bad Gateway' }
    )

    const listings = await extractor().scrapeSearchResults(page, SEARCH_URL, 5)

    expect(listings.map(listing => listing.url)).toEqual([listingUrl(1), listingUrl(2)])
  })
})

describe('HtmlListingExtractor.deepScrapeListings', () => {
  it('merges detail pages into shallow listings and keeps shallow ones on failure', async () => {
    const shallowOne = { url: listingUrl(1), title: 'Apto 1', price: 'R$ 500.000' }
    const shallowTwo = { url: listingUrl(2), title: 'Apto 2' }
    const withoutUrl = { title: 'Sem link' }
    const page = new FakePage(url =>
      url === listingUrl(1)
        ? ok('<h1>Apto 1 reformado</h1><span data-testid="iptu-value">R$ 90</span>')
        : { status: 'error', durationMs: 1, error: 'HTTP 500: Internal Server Error' }
    )
    const onListing = vi.fn(async () => undefined)

    const enriched = await extractor().deepScrapeListings(page, [shallowOne, shallowTwo, withoutUrl], onListing)

    const merged = { url: listingUrl(1), title: 'Apto 1 reformado', price: 'R$ 500.000', iptu: 'R$ 90', zap_code: '1' }
    expect(enriched).toEqual([merged, shallowTwo, withoutUrl])
    expect(onListing.mock.calls).toEqual([[merged]])
    expect(page.loaded).toEqual([listingUrl(1), listingUrl(2)])
  })

  it('keeps the shallow listing when a detail fetch throws a retryable error', async () => {
    const shallow = { url: listingUrl(1), title: 'Apto 1' }
    const page = new FakePage(url => {
      throw new TransientFetchError('Request failed: fetch failed', url)
    })

    await expect(extractor().deepScrapeListings(page, [shallow])).resolves.toEqual([shallow])
  })

  it('reports refused detail pages so the agent can rotate', async () => {
    const page = new FakePage(url => {
      if (url === listingUrl(1)) return { status: 'blocked', statusCode: 403, durationMs: 1, error: 'HTTP 403: Forbidden' }
      if (url === listingUrl(2)) {
        return { status: 'blocked', statusCode: 503, durationMs: 1, error: 'HTTP 503: Request blocked (captcha or access denied)' }
      }
      if (url === listingUrl(3)) throw new BlockedBySourceError('HTTP 429: Too Many Requests', url, 429)
      return { status: 'error', statusCode: 500, durationMs: 1, error: 'HTTP 500: Internal Server Error' }
    })
    const shallow = [1, 2, 3, 4].map(n => ({ url: listingUrl(n), title: `Apto ${n}` }))
    const onBlocked = vi.fn(async (_url: string, _error: string) => undefined)

    const enriched = await extractor().deepScrapeListings(page, shallow, undefined, onBlocked)

    expect(enriched).toEqual(shallow)
    expect(onBlocked.mock.calls).toEqual([
      [listingUrl(1), 'HTTP 403: Forbidden'],
      [listingUrl(2), 'HTTP 503: Request blocked (captcha or access denied)'],
      [listingUrl(3), 'HTTP 429: Too Many Requests'],
    ])
  })

  it('propagates errors raised by the save callback', async () => {
    const page = new FakePage(() => ok('<h1>Apto</h1>'))
    const onListing = vi.fn(async () => {
      throw new Error('disk full')
    })

    await expect(extractor().deepScrapeListings(page, [{ url: listingUrl(1) }], onListing)).rejects.toThrow('disk full')
  })
})
