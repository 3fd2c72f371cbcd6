import { UNEXPECTED_MENU_INPUT, UNEXPECTED_TEXT_INPUT } from '../src/handlers/conversation.handler';
import { ConversationStep } from '../src/types/session';
import { Harness, PROVIDER_PASSWORD, createHarness, menuValues } from './helpers/harness';

const PROVIDER = '94770000009';
const PROVIDER_MENU_TEXT = 'Manage your fleet:';
const SEATS_PROMPT = '💺 Enter the total number of seats:';

async function login(harness: Harness): Promise<void> {
  await harness.text(PROVIDER, 'hi');
  await harness.select(PROVIDER, 'role_provider');
  await harness.text(PROVIDER, PROVIDER_PASSWORD);
}

async function fillServiceFields(harness: Harness, answers: string[]): Promise<void> {
  await harness.select(PROVIDER, 'prov_add');
  for (const answer of answers) {
    await harness.text(PROVIDER, answer);
  }
}

const VALID_FIELDS = ['Kandy-Colombo', 'Hill Express', 'Sunil', 'skip', '40', '150', 'skip', '75', '+94 71 000 0001'];

async function currentStep(harness: Harness): Promise<ConversationStep | undefined> {
  const session = await harness.sessions.get(PROVIDER);
  return session?.step;
}

describe('provider flow', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness({ rows: [] });
  });

  describe('authentication', () => {
    it('asks for the password and retries on a wrong one', async () => {
      await harness.text(PROVIDER, 'hi');

      const prompt = await harness.select(PROVIDER, 'role_provider');
      expect(prompt.text).toBe('🔒 Enter Provider Password:');

      const wrong = await harness.text(PROVIDER, 'guess');
      expect(wrong.text).toBe("❌ Wrong password. Try again or type 'menu' to start over.\n\n🔒 Enter Provider Password:");
      expect(await currentStep(harness)).toBe(ConversationStep.PROVIDER_AUTH);
    });

    it('opens the provider menu on the right password', async () => {
      await harness.text(PROVIDER, 'hi');
      await harness.select(PROVIDER, 'role_provider');

      const menu = await harness.text(PROVIDER, PROVIDER_PASSWORD);

      expect(menu.text).toBe(`🔓 Access Granted\n\n${PROVIDER_MENU_TEXT}`);
      expect(menuValues(menu)).toEqual(['prov_add', 'prov_status', 'menu_main']);
    });

    it('expects typed text at the password prompt', async () => {
      await harness.text(PROVIDER, 'hi');
      await harness.select(PROVIDER, 'role_provider');

      const response = await harness.select(PROVIDER, 'prov_add');

      expect(response.text).toBe(`${UNEXPECTED_TEXT_INPUT}\n\n🔒 Enter Provider Password:`);
    });
  });

  describe('adding a service', () => {
    it('walks through every field prompt', async () => {
      await login(harness);

      const prompts: string[] = [(await harness.select(PROVIDER, 'prov_add')).text];
      for (const answer of VALID_FIELDS.slice(0, -1)) {
        prompts.push((await harness.text(PROVIDER, answer)).text);
      }

      expect(prompts).toEqual([
        '🆕 Add Service\n\nEnter the Route Name (e.g., Kandy-Colombo):',
        '🚍 Enter the Bus Service/Company Name (e.g., ABC Express):',
        '🧑 Enter Driver Name:',
        '🚌 Enter the Vehicle Class (e.g., Luxury, Semi-Luxury), or type "skip":',
        SEATS_PROMPT,
        '💵 Enter the Adult Fare (e.g., 150.00):',
        '🎓 Enter the Teacher/Student Fare, or type "skip" to use the adult fare:',
        '🧒 Enter the Child Fare, or type "skip" to use the adult fare:',
        '📞 Enter Contact Number:',
      ]);
    });

    it('re-prompts the same field on invalid input', async () => {
      await login(harness);
      await fillServiceFields(harness, VALID_FIELDS.slice(0, 4));

      const notANumber = await harness.text(PROVIDER, 'forty');
      expect(notANumber.text).toBe(`❌ Seat count must be a whole number (e.g., 40).\n\n${SEATS_PROMPT}`);

      const zero = await harness.text(PROVIDER, '0');
      expect(zero.text).toBe(`❌ Seat count must be between 1 and 500.\n\n${SEATS_PROMPT}`);

      expect(await currentStep(harness)).toBe(ConversationStep.PROVIDER_SEATS_ENTRY);
    });

    it('rejects a malformed fare and contact', async () => {
      await login(harness);
      await fillServiceFields(harness, VALID_FIELDS.slice(0, 5));

      const fare = await harness.text(PROVIDER, '1.999');
      expect(fare.text).toBe(
        '❌ Invalid price format. Please enter a number (e.g., 150.00).\n\n💵 Enter the Adult Fare (e.g., 150.00):'
      );

      await harness.text(PROVIDER, '150');
      await harness.text(PROVIDER, 'skip');
      await harness.text(PROVIDER, '75');
      const contact = await harness.text(PROVIDER, 'ring me');
      expect(contact.text).toBe('❌ Invalid contact format. Please enter a valid number.\n\n📞 Enter Contact Number:');
    });

    it('toggles payment methods and saves the service as active', async () => {
      await login(harness);
      await fillServiceFields(harness, VALID_FIELDS.slice(0, -1));

      const payment = await harness.text(PROVIDER, '+94 71 000 0001');
      expect(payment.text).toBe('💳 Payment Options\nToggle allowed methods, then save:');
      expect(payment.menu?.map((option) => option.label)).toEqual(['⬜ Weekly', '⬜ Monthly', '💾 Save & Finish']);

      const weekly = await harness.select(PROVIDER, 'pay:weekly');
      expect(weekly.menu?.map((option) => option.label)).toEqual(['✅ Weekly', '⬜ Monthly', '💾 Save & Finish']);

      await harness.select(PROVIDER, 'pay:monthly');
      const unselected = await harness.select(PROVIDER, 'pay:monthly');
      expect(unselected.menu?.map((option) => option.label)).toEqual(['✅ Weekly', '⬜ Monthly', '💾 Save & Finish']);

      const saved = await harness.select(PROVIDER, 'prov_save');
      expect(saved.text).toBe(`✅ Service Saved Successfully! (ID 1)\n\n${PROVIDER_MENU_TEXT}`);
      expect(await currentStep(harness)).toBe(ConversationStep.PROVIDER_MENU);

      const service = await harness.registry.getById('1');
      expect(service).toMatchObject({
        ownerChatId: PROVIDER,
        route: 'Kandy-Colombo',
        serviceName: 'Hill Express',
        driverName: 'Sunil',
        vehicleClass: null,
        fareTable: { adult: 150, teacher: 150, child: 75 },
        totalSeats: 40,
        remainingSeats: 40,
        status: 'active',
        contact: '+94 71 000 0001',
        paymentMethods: ['weekly'],
      });
    });

    it('keeps a typed vehicle class', async () => {
      await login(harness);
      await fillServiceFields(harness, ['Galle-Matara', 'Coastal Line', 'Nimal', 'Semi-Luxury', '25', '80', '60', '40', '0771234567']);
      await harness.select(PROVIDER, 'prov_save');

      const service = await harness.registry.getById('1');
      expect(service?.vehicleClass).toBe('Semi-Luxury');
      expect(service?.fareTable).toEqual({ adult: 80, teacher: 60, child: 40 });
      expect(service?.paymentMethods).toEqual([]);
    });

    it('makes a saved service bookable by passengers', async () => {
      await login(harness);
      await fillServiceFields(harness, VALID_FIELDS);
      await harness.select(PROVIDER, 'prov_save');

      await harness.text('94770000001', 'hi');
      const routes = await harness.select('94770000001', 'role_passenger');

      expect(menuValues(routes)).toEqual(['route:Kandy-Colombo', 'menu_main']);
    });
  });

  describe('status toggle', () => {
    it('tells a provider without services that there is nothing to toggle', async () => {
      await login(harness);

      const response = await harness.select(PROVIDER, 'prov_status');

      expect(response.alert).toBe(true);
      expect(response.text).toBe(`No services added yet.\n\n${PROVIDER_MENU_TEXT}`);
      expect(await currentStep(harness)).toBe(ConversationStep.PROVIDER_MENU);
    });

    it('lists only the provider’s own services and re-renders after each toggle', async () => {
      await harness.addService({ ownerChatId: 'someone-else', serviceName: 'Other Line' });
      const id = await harness.addService({ ownerChatId: PROVIDER });
      await login(harness);

      const list = await harness.select(PROVIDER, 'prov_status');
      expect(list.text).toBe('Tap to toggle availability (Holiday/Weather):');
      expect(list.menu).toEqual([
        { label: 'Hill Express - Kandy-Colombo', value: `toggle:${id}`, description: '🟢 ACTIVE' },
        { label: '🔙 Provider Menu', value: 'prov_menu' },
      ]);

      const toggled = await harness.select(PROVIDER, `toggle:${id}`);
      expect(toggled.menu?.[0].description).toBe('🔴 UNAVAILABLE');
      const service = await harness.registry.getById(id);
      expect(service?.status).toBe('unavailable');

      const back = await harness.select(PROVIDER, `toggle:${id}`);
      expect(back.menu?.[0].description).toBe('🟢 ACTIVE');
    });

    it('refuses to toggle a service it did not list', async () => {
      const foreign = await harness.addService({ ownerChatId: 'someone-else' });
      await harness.addService({ ownerChatId: PROVIDER });
      await login(harness);
      await harness.select(PROVIDER, 'prov_status');

      const response = await harness.select(PROVIDER, `toggle:${foreign}`);

      expect(response.text.startsWith(`${UNEXPECTED_MENU_INPUT}\n\n`)).toBe(true);
      const service = await harness.registry.getById(foreign);
      expect(service?.status).toBe('active');
    });

    it('keeps the current page of a long service list after a toggle', async () => {
      for (let index = 0; index < 10; index += 1) {
        await harness.addService({ ownerChatId: PROVIDER, serviceName: `Line ${index}` });
      }
      await login(harness);

      const first = await harness.select(PROVIDER, 'prov_status');
      expect(menuValues(first)).toEqual([
        'toggle:1',
        'toggle:2',
        'toggle:3',
        'toggle:4',
        'toggle:5',
        'toggle:6',
        'toggle:7',
        'page:1',
        'prov_menu',
      ]);

      const second = await harness.select(PROVIDER, 'page:1');
      expect(menuValues(second)).toEqual(['toggle:8', 'toggle:9', 'toggle:10', 'page:0', 'prov_menu']);

      const toggled = await harness.select(PROVIDER, 'toggle:10');
      expect(menuValues(toggled)).toEqual(['toggle:8', 'toggle:9', 'toggle:10', 'page:0', 'prov_menu']);
      expect(toggled.menu?.[2].description).toBe('🔴 UNAVAILABLE');
    });

    it('returns to the provider menu', async () => {
      await harness.addService({ ownerChatId: PROVIDER });
      await login(harness);
      await harness.select(PROVIDER, 'prov_status');

      const response = await harness.select(PROVIDER, 'prov_menu');

      expect(response.text).toBe(PROVIDER_MENU_TEXT);
      expect(await currentStep(harness)).toBe(ConversationStep.PROVIDER_MENU);
    });
  });
});
