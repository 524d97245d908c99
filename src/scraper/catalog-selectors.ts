/**
 * Generic selectors and marker vocabularies for storefront catalog pages
 * Ordered lists are tried first to last; the first usable match wins.
 * Per-site overrides from the snapshot config are tried before these.
 */

/** Repeated product-card containers across common storefront themes */
export const CARD_SELECTORS: string[] = [
  '[data-product-id]',
  '.product-card',
  '.product-item',
  'li.product',
  '.products .product',
  '.product-grid-item',
  '.grid-product',
  '.grid__item .card-wrapper',
  '.card-wrapper',
  '.product-miniature',
  '.product-tile',
  '.product-box',
  '.productItem',
  '[itemtype*="schema.org/Product"]',
  '.product',
];

/** Minimum matches for a selector to count as a card list */
export const MIN_CARD_MATCHES = 3;

/** Hard cap on cards processed per page */
export const MAX_CARDS_PER_PAGE = 300;

/** Path fragments that mark an anchor as pointing at a product page */
export const PRODUCT_PATH_MARKERS: string[] = ['/product', '/products/', '/p/', '/item/', '/dp/'];

/** Heading and link selectors tried for the product name */
export const NAME_SELECTORS: string[] = [
  '.card__heading a',
  '.card__heading',
  '[itemprop="name"]',
  '.product-title a',
  '.product-title',
  '.product-name a',
  '.product-name',
  '.woocommerce-loop-product__title',
  'h3 a',
  'h2 a',
  'h4 a',
  'h3',
  'h2',
  'h4',
  'a',
];

/** Attributes read (in order) when no heading text is available */
export const NAME_ATTRIBUTES: string[] = ['data-product-title', 'title', 'aria-label'];

/** Sub-elements removed from a name element before its text is read */
export const PRICE_NOISE_SELECTORS: string[] = [
  '.price',
  '.money',
  '.woocommerce-Price-amount',
  '.current-price',
  '.Price',
  '[aria-hidden="true"]',
];

/** Anchors tried for the product URL */
export const URL_SELECTORS: string[] = ['a[href]'];

/** Price containers, most specific first */
export const PRICE_SELECTORS: string[] = [
  '.price',
  '.price .amount',
  '.price .money',
  '.price-wrapper .price',
  '.Price .money',
  '.current-price',
  '[itemprop="price"]',
  '.woocommerce-Price-amount bdi',
  '.woocommerce-Price-amount',
];

/** Code reported whenever a recognized currency token is present */
export const DEFAULT_CURRENCY = 'EGP';

/** Out-of-stock phrases, matched against lower-cased card text */
export const OUT_OF_STOCK_MARKERS: string[] = [
  'out of stock',
  'out-of-stock',
  'sold out',
  'unavailable',
  'غير متوفر',
  'غير متاح',
  'نفدت الكمية',
];

/** Pagination links, most explicit first */
export const PAGINATION_SELECTORS: string[] = [
  "a[rel='next']",
  "link[rel='next']",
  'a.next',
  'a.pagination__next',
  "a.page-link[rel='next']",
  "a[aria-label*='Next' i]",
  "a[href*='?page=']",
  "a[href*='/page/']",
  'li.pagination-next a',
  '.pagination a.next',
];

/** Accessory and peripheral words that make an anchor a category candidate */
export const CATEGORY_KEYWORDS: string[] = [
  'accessor',
  'keyboard',
  'mouse',
  'mice',
  'headset',
  'headphone',
  'controller',
  'gamepad',
  'webcam',
  'monitor',
  'stand',
  'mount',
  'cable',
  'adapter',
  'charger',
  'cooler',
  'peripheral',
  'gaming',
];

/** URL path fragments accepted by the filter even without a keyword hit */
export const ACCESSORY_PATH_ALLOWLIST: string[] = [
  '/accessor',
  '/accessories',
  '/controllers',
  '/controller',
  '/keyboards',
  '/keyboard',
  '/mouse',
  '/mice',
  '/headset',
  '/headphone',
  '/audio',
  '/webcam',
  '/monitor',
  '/stands',
  '/mount',
  '/case',
  '/cooler',
  '/fans',
  '/cables',
  '/adapter',
  '/gaming-gear',
  '/gaming-accessories',
  '/peripherals',
];

/** Load-more controls clicked during rendered fetches */
export const LOAD_MORE_TEXTS: string[] = ['Load more', 'Show more', 'View more', 'عرض المزيد', 'مشاهدة المزيد'];

/** Conventional sitemap locations probed when seeding a site */
export const SITEMAP_PATHS: string[] = [
  '/sitemap.xml',
  '/sitemap_index.xml',
  '/product-sitemap.xml',
  '/sitemap_products_1.xml',
  '/sitemap-products.xml',
];

/** Path hints that make a sitemap URL worth seeding */
export const SITEMAP_PATH_HINTS: string[] = ['product', 'categor', 'collection', 'shop', '/c/', '/p/'];
