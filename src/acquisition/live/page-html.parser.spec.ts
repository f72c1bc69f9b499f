import { isSignInWall, parsePageHtml, parsePostsHtml } from './page-html.parser';

const ABOUT_HTML = `
<html>
  <head>
    <meta property="og:description" content="Acme builds rockets." />
    <meta property="og:image" content="https://cdn.example.test/acme.png" />
  </head>
  <body>
    <h1> Acme Corporation </h1>
    <p class="followers">12,345 followers</p>
    <dl>
      <dt>Website</dt><dd>https://acme.example.test</dd>
      <dt>Industry</dt><dd>Aerospace</dd>
      <dt>Company size</dt><dd>501-1,000 employees</dd>
      <dt>Headquarters</dt><dd>Denver, CO</dd>
      <dt>Founded</dt><dd>1999</dd>
      <dt>Specialties</dt><dd>Rockets, Propulsion and Avionics</dd>
    </dl>
  </body>
</html>`;

const POSTS_HTML = `
<html><body>
  <div data-id="urn:post:1">
    <p>Launch day!</p>
    <img src="https://cdn.example.test/1.png" />
    <span>1,204 likes</span>
    <span>31 comments</span>
    <span>12 shares</span>
    <span>3.5K views</span>
    <time datetime="2026-01-10T12:00:00.000Z"></time>
  </div>
  <div data-id="urn:post:2"><span></span></div>
  <div data-id="urn:post:3"><p>Second post</p></div>
</body></html>`;

describe('page HTML parser', () => {
  it('reads the about section', () => {
    expect(parsePageHtml(ABOUT_HTML, 'https://www.linkedin.com/company/acme')).toEqual({
      name: 'Acme Corporation',
      url: 'https://www.linkedin.com/company/acme',
      description: 'Acme builds rockets.',
      industry: 'Aerospace',
      headquarters: 'Denver, CO',
      website: 'https://acme.example.test',
      companySize: '501-1,000 employees',
      foundedYear: 1999,
      specialties: ['Rockets', 'Propulsion', 'Avionics'],
      profilePictureUrl: 'https://cdn.example.test/acme.png',
      followersCount: 12_345,
      employeesCount: 1_000,
    });
  });

  it('caps counts at what the storage columns hold', () => {
    const html = `<html><body>
      <h1>Huge Co</h1>
      <p>3B followers</p>
    </body></html>`;

    expect(parsePageHtml(html, 'https://www.linkedin.com/company/huge')?.followersCount).toBe(
      2_147_483_647,
    );
  });

  it('prefers the on-platform employee count', () => {
    const html = `<html><body><h1>Globex</h1>
      <div><span>Employees on LinkedIn</span><span>2.5K</span></div>
    </body></html>`;

    expect(parsePageHtml(html, 'https://www.linkedin.com/company/globex')?.employeesCount).toBe(2_500);
  });

  it('detects the sign-in wall', () => {
    expect(isSignInWall('<html><body><h1>Sign in</h1></body></html>')).toBe(true);
    expect(isSignInWall('<html><body><p>No heading</p></body></html>')).toBe(true);
    expect(isSignInWall(ABOUT_HTML)).toBe(false);
    expect(parsePageHtml('<html><body><h1>Sign in</h1></body></html>', 'https://x.test')).toBeNull();
  });

  it('reads posts with their metrics and skips empty ones', () => {
    const posts = parsePostsHtml(POSTS_HTML, 50);

    expect(posts).toEqual([
      {
        postId: 'urn:post:1',
        content: 'Launch day!',
        imageUrl: 'https://cdn.example.test/1.png',
        likesCount: 1_204,
        commentsCount: 31,
        sharesCount: 12,
        viewsCount: 3_500,
        postedAt: new Date('2026-01-10T12:00:00.000Z'),
      },
      {
        postId: 'urn:post:3',
        content: 'Second post',
        imageUrl: null,
        likesCount: 0,
        commentsCount: 0,
        sharesCount: 0,
        viewsCount: 0,
        postedAt: null,
      },
    ]);
  });

  it('stops at the post limit', () => {
    expect(parsePostsHtml(POSTS_HTML, 1).map((post) => post.postId)).toEqual(['urn:post:1']);
  });
});
