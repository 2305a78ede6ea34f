import type { Guide } from './types'

export const routingGuide: Guide = {
  id: 'guide-routing',
  title: 'Client-Side Routing',
  subtitle: 'URLs mapped to components, with a protected route',
  color: 'indigo',
  icon: '🧭',
  sections: [
    {
      id: 'routes',
      title: 'Routes and Params',
      content: [
        {
          type: 'text',
          body: 'A router matches the current location against a table of paths and renders the element for the first match. Dynamic segments such as :postId are read with useParams. The catch-all * route renders a not-found page.',
        },
        {
          type: 'code',
          language: 'tsx',
          code: `<Routes>
  <Route element={<Layout />}>
    <Route index element={<Home />} />
    <Route path="posts" element={<Posts />} />
    <Route path="posts/:postId" element={<PostPage />} />
    <Route path="dashboard" element={<RequireAuth><Dashboard /></RequireAuth>} />
    <Route path="*" element={<NotFound />} />
  </Route>
</Routes>`,
          caption: 'Nested routes render inside the layout through <Outlet />',
        },
        {
          type: 'concept-card',
          term: 'MemoryRouter',
          explanation: 'Keeps history in memory instead of the address bar. Used here so the demo does not change the page URL.',
        },
        {
          type: 'concept-card',
          term: 'NavLink',
          explanation: 'A Link that knows whether it matches the current location and can style itself as active.',
        },
      ],
    },
    {
      id: 'protected',
      title: 'Protected Routes',
      content: [
        {
          type: 'text',
          body: 'RequireAuth reads the user from context. Without one it renders <Navigate to="/login" state={{ from: location }} replace />. After login the page reads that state and navigates back to where the visitor was going.',
        },
        {
          type: 'callout',
          tone: 'warning',
          body: 'Client-side guards only hide UI. The server must still refuse data to users who are not allowed to see it.',
        },
        {
          type: 'quiz',
          question: 'Why does the redirect to /login use replace?',
          options: [
            'So Back does not return to the protected page and bounce to login again',
            'Because push is not supported by MemoryRouter',
            'To clear the auth context',
          ],
          correctIndex: 0,
          explanation: 'With push, pressing Back from the login page would land on /dashboard, which redirects straight to /login again.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Router demo', file: 'src/components/demos/RoutingDemo.tsx', description: 'Routes, params, RequireAuth and the redirect target' },
    { concept: 'Auth state', file: 'src/context/AuthContext.tsx', description: 'The user the guard checks' },
  ],
}
