import type { ListingSource } from './listingProvider.js';
import type { RssSource } from './rssProvider.js';

export const listingSources: ListingSource[] = [
  // ---------- Governo/Multilaterais ----------
  {
    name: 'ADB (CSRN/Procurement)',
    group: 'gov',
    urls: ['https://www.adb.org/projects/tenders'],
    hrefKeywords: ['tenders', 'csrn', 'procurement', 'notice'],
    agency: 'ADB',
    region: 'Asia',
    scrapeDeadline: true,
  },
  {
    name: 'AfDB Procurement',
    group: 'gov',
    urls: ['https://www.afdb.org/en/projects-and-operations/procurement'],
    hrefKeywords: ['procurement', 'tenders', 'opportunities', 'request', 'rfp'],
    agency: 'AfDB',
    region: 'Africa',
    scrapeDeadline: true,
  },
  {
    name: 'Challenge.gov',
    group: 'gov',
    urls: ['https://www.challenge.gov'],
    hrefKeywords: ['challenge', 'competition', 'prize'],
    agency: 'US Agencies',
    region: 'US',
    scrapeDeadline: true,
  },
  {
    name: 'EIB Procurement',
    group: 'gov',
    urls: ['https://www.eib.org/en/about/procurement/index.htm'],
    hrefKeywords: ['procurement', 'tenders', 'calls', 'notice'],
    agency: 'EIB',
    region: 'EU',
    scrapeDeadline: true,
  },
  {
    name: 'EU Funding & Tenders',
    group: 'gov',
    urls: ['https://ec.europa.eu/info/funding-tenders/opportunities/data/topic-list.html'],
    topicUrl: 'https://ec.europa.eu/info/funding-tenders/opportunities/portal/screen/opportunities/topic-details/{code}',
    agency: 'European Commission',
    region: 'EU',
    scrapeDeadline: false,
  },
  {
    name: 'Find a Grant (GOV.UK)',
    group: 'gov',
    urls: ['https://www.find-government-grants.service.gov.uk/grants'],
    hrefKeywords: ['/grants/'],
    titleKeywords: ['grant'],
    keywordsMatchAny: true,
    agency: 'UK Gov',
    region: 'UK',
    scrapeDeadline: true,
  },
  {
    name: 'IDB Invest Procurement',
    group: 'gov',
    urls: ['https://idbinvest.org/en/procurement'],
    hrefKeywords: ['procurement', 'tenders', 'opportunities'],
    agency: 'IDB Invest',
    region: 'LatAm',
    scrapeDeadline: true,
  },
  {
    name: 'IDB Project Procurement/BEO',
    group: 'gov',
    urls: ['https://projectprocurement.iadb.org/en'],
    hrefKeywords: ['procurement', 'opportunities', 'tenders', 'bank-executed'],
    agency: 'IDB',
    region: 'LatAm',
    scrapeDeadline: true,
  },
  {
    name: 'UNGM',
    group: 'gov',
    urls: ['https://www.ungm.org/Public/Notice'],
    hrefKeywords: ['Notice'],
    agency: 'UN System',
    region: 'Global',
    scrapeDeadline: true,
  },
  {
    name: 'World Bank Procurement',
    group: 'gov',
    urls: ['https://projects.worldbank.org/en/projects-operations/procurement'],
    hrefKeywords: ['procurement', 'tenders', 'notice'],
    agency: 'World Bank',
    region: 'Global',
    scrapeDeadline: true,
  },

  // ---------- Filantropia ----------
  {
    name: '100+ Accelerator',
    group: 'phil',
    urls: ['https://www.100accelerator.com'],
    titleKeywords: ['apply', 'challenge'],
    agency: 'AB InBev & Partners',
    region: 'Global',
    scrapeDeadline: true,
  },
  {
    name: 'Green Climate Fund (GCF)',
    group: 'phil',
    urls: ['https://www.greenclimate.fund/work-with-us/opportunities'],
    titleKeywords: ['request for', 'rfp', 'concept', 'call', 'opportunit'],
    agency: 'GCF',
    region: 'Global',
    scrapeDeadline: true,
  },
  {
    name: 'Wellcome',
    group: 'phil',
    urls: ['https://wellcome.org/grant-funding/schemes'],
    hrefKeywords: ['/grant-funding/schemes/'],
    agency: 'Wellcome',
    region: 'Global',
    scrapeDeadline: true,
  },
  {
    name: 'XPRIZE',
    group: 'phil',
    urls: ['https://www.xprize.org/prizes'],
    hrefKeywords: ['/prizes/'],
    titleKeywords: ['prize'],
    keywordsMatchAny: true,
    agency: 'XPRIZE',
    region: 'Global',
    scrapeDeadline: true,
  },

  // ---------- América Latina / Brasil ----------
  {
    name: 'BNDES Chamadas',
    group: 'latam',
    urls: [
      'https://www.bndes.gov.br/wps/portal/site/home/mercado-de-capitais/fundos-de-investimentos/chamadas-publicas-para-selecao-de-fundos',
    ],
    hrefPattern: /\?1dmy.*chamadas-publicas-para-fundos|chamadas-publicas-para-fundos.*\?1dmy/,
    agency: 'BNDES',
    region: 'Brasil',
    // the listing only carries links; deadlines live in attached PDFs
    scrapeDeadline: false,
  },
  {
    name: 'CAIXA Chamadas Abertas',
    group: 'latam',
    urls: [
      'https://www.caixa.gov.br/sustentabilidade/fundo-socioambiental-caixa/chamadas-abertas/Paginas/default.aspx',
    ],
    titleKeywords: ['edital', 'chamada', 'seleção', 'regulamento'],
    agency: 'CAIXA',
    region: 'Brasil',
    scrapeDeadline: true,
  },
  {
    name: 'FAPESP Chamadas',
    group: 'latam',
    urls: [
      'https://fapesp.br/chamadas-proprias/',
      'https://fapesp.br/colaboracao-internacional/',
      'https://fapesp.br/colaboracao-nacional-regional/',
      'https://fapesp.br/programas-fapesp/',
      'https://fapesp.br/pesquisa-para-inovacao/',
    ],
    hrefPattern: /^https?:\/\/(?:www\.)?fapesp\.br\/\d+\/.+/,
    maxPagerDepth: 5,
    agency: 'FAPESP',
    region: 'Brasil',
    scrapeDeadline: true,
  },
  {
    name: 'FINEP Chamadas',
    group: 'latam',
    urls: ['https://www.finep.gov.br/chamadas-publicas/chamadaspublicas?situacao=aberta'],
    hrefPattern: /finep\.gov\.br\/chamadas-publicas\/(?!chamadaspublicas)/,
    maxPagerDepth: 5,
    agency: 'FINEP',
    region: 'Brasil',
    scrapeDeadline: true,
  },
  {
    name: 'FUNBIO – Portal de Chamadas',
    group: 'latam',
    urls: [
      'https://preprod-chamadas.funbio.org.br/',
      'https://preprod-chamadas.funbio.org.br/lista-de-selecoes',
    ],
    hrefPattern: /^https?:\/\/(?:preprod-)?chamadas\.funbio\.org\.br\/[a-z0-9-]+\/?$/,
    agency: 'FUNBIO',
    region: 'Brasil',
    scrapeDeadline: true,
  },
  {
    name: 'Fundo Socioambiental CAIXA',
    group: 'latam',
    urls: [
      'https://www.caixa.gov.br/poder-publico/programas-sociais/fundo-socioambiental/Paginas/default.aspx',
    ],
    titleKeywords: ['edital', 'seleção', 'chamada'],
    agency: 'CAIXA',
    region: 'Brasil',
    scrapeDeadline: true,
  },
  {
    name: 'Fundo Vale',
    group: 'latam',
    urls: ['https://www.fundovale.org/'],
    titleKeywords: ['edital', 'chamada', 'parceria', 'seleção'],
    agency: 'Fundo Vale',
    region: 'Brasil',
    scrapeDeadline: true,
  },
  {
    name: 'SEBRAE Editais/Programas',
    group: 'latam',
    urls: ['https://www.sebrae.com.br/sites/PortalSebrae/ufs/df/sebraeaz/editais'],
    titleKeywords: ['edital', 'programa', 'seleção', 'chamada'],
    agency: 'SEBRAE',
    region: 'Brasil',
    scrapeDeadline: true,
  },
];

export const rssSources: RssSource[] = [
  {
    name: 'UKRI Funding Finder',
    group: 'gov',
    feedUrl: 'https://www.ukri.org/opportunity/feed/',
    agency: 'UKRI',
    region: 'UK',
    scrapeDeadline: true,
  },
  {
    name: 'UNDP Procurement',
    group: 'gov',
    feedUrl: 'https://procurement-notices.undp.org/proc_notices_rss_feed.cfm',
    agency: 'UNDP',
    region: 'Global',
    scrapeDeadline: false,
  },
];
