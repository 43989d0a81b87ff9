// Poke form HTML
// Served for GET /<topic>. The room field is filled in from the URL by the page itself.

export const pokeFormHtml = () => `
<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Pok'em</title>
  <style>
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
      max-width: 40rem;
      margin: 2rem auto;
      padding: 0 1rem;
    }
    #success-message { color: green; display: none; }
    #error-message { color: red; display: none; }
  </style>
  <script>
    async function submitForm(event) {
      event.preventDefault();

      const successMessage = document.getElementById('success-message');
      const errorMessage = document.getElementById('error-message');
      successMessage.style.display = 'none';
      errorMessage.style.display = 'none';

      const room = document.getElementById('room').value;
      const message = document.getElementById('message').value;

      if (!room || !message) {
        errorMessage.textContent = 'Please fill in both fields.';
        errorMessage.style.display = 'block';
        return;
      }

      try {
        const response = await fetch('/' + encodeURIComponent(room), {
          method: 'POST',
          headers: { 'Content-Type': 'text/plain' },
          body: message,
        });

        if (response.ok) {
          successMessage.textContent = 'Message sent successfully!';
          successMessage.style.display = 'block';
        } else {
          errorMessage.textContent = 'Failed to send message. Status: ' + response.status;
          errorMessage.style.display = 'block';
        }
      } catch (error) {
        errorMessage.textContent = 'Error sending message: ' + error.message;
        errorMessage.style.display = 'block';
      }
    }

    function setInitialRoomValue() {
      const path = window.location.pathname;
      const room = path.substring(path.lastIndexOf('/') + 1);
      try {
        document.getElementById('room').value = decodeURIComponent(room);
      } catch {
        document.getElementById('room').value = room;
      }
    }

    window.onload = setInitialRoomValue;
  </script>
</head>
<body>
  <h2>Pok'em!</h2>
  <h3>Provide the Room and Message and we'll Poke Them for you.</h3>

  <form onsubmit="submitForm(event);">
    <label for="room">Room:</label><br>
    <input type="text" id="room" size="30" maxlength="256"><br>
    <label for="message">Message:</label><br>
    <textarea id="message" rows="4" cols="50" maxlength="1024"></textarea><br><br>
    <input type="submit" value="Submit">
  </form>

  <div id="success-message"></div>
  <div id="error-message"></div>
</body>
</html>
`;
