import { describe, expect, it } from 'vitest';
import { describeElements, type InteractiveElement } from './browser-utils.js';
import { formatPageState } from './page-actions.js';

function element(overrides: Partial<InteractiveElement>): InteractiveElement {
  return {
    index: 0,
    tag: 'button',
    selector: 'button',
    text: '',
    type: '',
    role: '',
    ariaLabel: '',
    href: '',
    placeholder: '',
    value: '',
    disabled: false,
    checked: false,
    ...overrides,
  };
}

describe('describeElements', () => {
  it('prints one line per element', () => {
    const elements = [
      element({ index: 0, tag: 'a', text: 'Pricing', href: '/pricing', selector: 'nav > a:nth-of-type(2)' }),
      element({
        index: 1,
        tag: 'input',
        type: 'email',
        placeholder: 'you@example.com',
        value: 'a@example.com',
        selector: 'input[name="email"]',
      }),
      element({ index: 2, tag: 'input', type: 'checkbox', ariaLabel: 'Remember me', checked: true, selector: '#remember' }),
      element({ index: 3, tag: 'div', role: 'button', text: 'Submit', disabled: true, selector: '[data-testid="submit"]' }),
    ];

    expect(describeElements(elements).split('\n')).toEqual([
      '[0] a "Pricing" href=/pricing (nav > a:nth-of-type(2))',
      '[1] input type=email "you@example.com" value="a@example.com" (input[name="email"])',
      '[2] input type=checkbox "Remember me" checked (#remember)',
      '[3] button "Submit" disabled ([data-testid="submit"])',
    ]);
  });

  it('says so when there is nothing to interact with', () => {
    expect(describeElements([])).toBe('(no interactive elements)');
  });

  it('truncates long lists', () => {
    const elements = [0, 1, 2, 3].map((index) =>
      element({ index, text: `Item ${index}`, selector: `#item-${index}` }),
    );

    expect(describeElements(elements, 2)).toBe(
      ['[0] button "Item 0" (#item-0)', '[1] button "Item 1" (#item-1)', '... 2 more'].join('\n'),
    );
  });
});

describe('formatPageState', () => {
  it('shows url, title and elements', () => {
    const state = {
      url: 'http://localhost:3000/login',
      title: '',
      elements: [element({ text: 'Sign in', selector: '#login' })],
    };

    expect(formatPageState(state)).toBe(
      [
        'URL: http://localhost:3000/login',
        'Title: (untitled)',
        'Interactive elements:',
        '[0] button "Sign in" (#login)',
      ].join('\n'),
    );
  });
});
