/**
 * Listing Page Selectors
 *
 * The source renders listing cards and detail pages with stable
 * `data-testid` / `data-cy` hooks. Structured data (JSON-LD, Open Graph) is
 * read first; these selectors fill whatever it leaves out.
 */

export const SELECTORS = {
  // JSON-LD schema (preferred - most reliable)
  jsonLd: 'script[type="application/ld+json"]',

  // Result card heading
  cardTitle: '[data-cy="rp-cardProperty-title-txt"], h2, h3',

  // Shallow fields (cards and detail pages)
  title: 'h1[data-testid="listing-title"], h1.title, h1',
  price: '[data-testid="price-value"], [data-cy="rp-cardProperty-price-txt"], .price__value',
  location: '[data-testid="address-info"], [data-cy="rp-cardProperty-location-txt"], .address',
  area: '[itemprop="floorSize"], [data-cy="rp-cardProperty-propertyArea-txt"], .feature__area',
  bedrooms: '[itemprop="numberOfRooms"], [data-cy="rp-cardProperty-bedroomQuantity-txt"]',
  bathrooms: '[itemprop="numberOfBathroomsTotal"], [data-cy="rp-cardProperty-bathroomQuantity-txt"]',
  parkingSpaces: '[itemprop="numberOfParkingSpaces"], [data-cy="rp-cardProperty-parkingSpacesQuantity-txt"]',
  description: '[data-testid="description-content"], .description__text',
  images: '[data-testid="carousel-photos"] img, .carousel img',

  // Deep fields (detail pages only)
  fullAddress: '[data-testid="location-address"], .address-info-value',
  fullDescription: '[data-testid="description-content"], .description__content',
  advertiserName: '[data-testid="advertiser-info-header"], .advertiser-info__name',
  advertiserCode: '[data-testid="advertiser-code"], .advertiser-info__creci',
  listingCode: '[data-testid="listing-code"], .listing-code',
  phone: '[data-testid="phone-number"], .advertiser-phone',
  whatsapp: 'a[href*="wa.me"], [data-testid="whatsapp-button"]',
  iptu: '[data-testid="iptu-value"], .iptu__value',
  condoFee: '[data-testid="condo-fee-value"], .condo-fee__value',
  suites: '[itemprop="numberOfSuites"], [data-testid="amenity-suites"]',
  floorLevel: '[itemprop="floorLevel"], [data-testid="amenity-floor"]',
  amenities: '[data-testid="amenities-list"] li, .amenities__list li',
} as const

/** Open Graph properties read as fallbacks */
export const OPEN_GRAPH = {
  title: 'meta[property="og:title"]',
  description: 'meta[property="og:description"]',
  image: 'meta[property="og:image"]',
} as const
