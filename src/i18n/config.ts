import i18n from 'i18next';
import { APP_LANGUAGE } from '@/config';
import { logger } from '@/shared/utils/logger';

// Import translations
import enCommon from './locales/en/common.json';
import enPaywall from './locales/en/paywall.json';
import enSession from './locales/en/session.json';

import esCommon from './locales/es/common.json';
import esPaywall from './locales/es/paywall.json';
import esSession from './locales/es/session.json';

const resources = {
  en: {
    common: enCommon,
    paywall: enPaywall,
    session: enSession,
  },
  es: {
    common: esCommon,
    paywall: esPaywall,
    session: esSession,
  },
};

// Resources are bundled, so init completes synchronously and `t` is usable
// as soon as this module is imported.
i18n
  .init({
    resources,
    lng: APP_LANGUAGE,
    fallbackLng: 'en',
    defaultNS: 'common',
    ns: ['common', 'paywall', 'session'],
    initImmediate: false,
    interpolation: {
      escapeValue: false, // messages are never rendered as HTML here
    },
  })
  .catch((err: unknown) => {
    logger.error('i18n', 'Init failed:', err);
  });

export default i18n;
